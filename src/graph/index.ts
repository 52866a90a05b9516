export { GraphDocument } from './graph-document';
export { DispatchEngine } from './dispatch-engine';
export { applyAnalyses } from './analysis-hook';
export {
  DgmlBuilder,
  assemble,
  assembleWithReport,
} from './dgml-builder';
export type { AssemblyOptions, AssemblyReport, AssemblyResult } from './dgml-builder';
export { AssemblyError, AssemblyErrorKind } from './errors';
export type { AssemblyErrorContext } from './errors';
