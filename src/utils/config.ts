import { config as dotenvConfig } from 'dotenv';
import path from 'path';

// Load environment variables
dotenvConfig();

export interface LoggingConfig {
  level: string;
  file: string;
}

export interface OutputConfig {
  file: string;
  maxFiles: number;
}

export interface Config {
  logging: LoggingConfig;
  output: OutputConfig;
  nodeEnv: string;
}

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (!value) {
    throw new Error(`Environment variable ${key} is required but not set`);
  }
  return value;
}

function getEnvVarAsNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a valid number`);
  }
  return parsed;
}

export const config: Config = {
  logging: {
    level: getEnvVar('LOG_LEVEL', 'info'),
    file: getEnvVar('LOG_FILE', path.join(process.cwd(), 'logs', 'dgml-builder.log')),
  },
  output: {
    file: getEnvVar('DGML_OUTPUT', 'types.dgml'),
    maxFiles: getEnvVarAsNumber('DGML_MAX_FILES', 5000),
  },
  nodeEnv: getEnvVar('NODE_ENV', 'development'),
};
