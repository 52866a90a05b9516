import { GraphDocument } from '../graph/graph-document';
import { Property, Style } from '../model';
import { Analysis } from './analysis';
import defaultPalette from './palette.json';

/**
 * Gives every category without an explicit background a colour from a palette,
 * in category order, wrapping around when the palette runs out.
 */
export class CategoryColorAnalysis implements Analysis {
  readonly name = 'category-color';
  readonly properties: readonly Property[] = [];
  readonly styles: readonly Style[] = [];

  constructor(private readonly palette: readonly string[] = defaultPalette) {
    if (palette.length === 0) {
      throw new Error('CategoryColorAnalysis requires at least one colour');
    }
  }

  execute(graph: GraphDocument): void {
    let next = 0;
    for (const category of graph.categories) {
      if (category.background) continue;
      category.background = this.palette[next % this.palette.length];
      next++;
    }
  }
}
