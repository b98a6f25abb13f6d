import fs from 'fs';
import yaml from 'js-yaml';
import { ValidateFunction } from 'ajv';
import { describeErrors } from './validation';
import { logger } from '../observability/logger';

const log = logger.child({ component: 'yaml-loader' });

/** Thrown when a resource file exists but cannot be parsed or fails its schema */
export class ResourceFileError extends Error {
  constructor(
    public readonly filePath: string,
    detail: string,
  ) {
    super(`Invalid resource file ${filePath}: ${detail}`);
    this.name = 'ResourceFileError';
  }
}

/**
 * Read and validate a YAML resource. Returns null when the file does not exist;
 * throws ResourceFileError when it exists but is malformed.
 */
export function loadYamlResource<T>(filePath: string, validate: ValidateFunction<T>): T | null {
  if (!fs.existsSync(filePath)) {
    log.warn({ filePath }, 'Resource file not found');
    return null;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ResourceFileError(filePath, err instanceof Error ? err.message : String(err));
  }

  if (!validate(parsed)) {
    throw new ResourceFileError(filePath, describeErrors(validate.errors));
  }

  log.debug({ filePath }, 'Resource file loaded');
  return parsed;
}
