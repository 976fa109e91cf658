import { readFile } from 'node:fs/promises';
import { isAbsolute, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../domain/errors.js';
import { rubricSchema } from '../domain/schemas.js';
import type { Rubric } from '../domain/types.js';
import { logger } from './logger.js';

const log = logger.child({ module: 'rubric-loader' });

const projectRoot = fileURLToPath(new URL('../../', import.meta.url));

/** Relative paths are taken from the project root, so the working directory does not matter. */
export function resolveRubricPath(path: string): string {
  return isAbsolute(path) ? path : resolve(projectRoot, path);
}

export function parseRubric(source: string): Result<Rubric, AppError> {
  let raw: unknown;
  try {
    raw = YAML.parse(source);
  } catch (cause) {
    return err(createAppError(ErrorCode.RUBRIC_INVALID, 'Rubric is not valid YAML', false, describeCause(cause)));
  }

  const parsed = rubricSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    return err(createAppError(ErrorCode.RUBRIC_INVALID, 'Rubric does not match the expected structure', false, details));
  }

  return ok(parsed.data);
}

export async function loadRubric(rubricPath: string): Promise<Result<Rubric, AppError>> {
  const path = resolveRubricPath(rubricPath);
  let source: string;
  try {
    source = await readFile(path, 'utf-8');
  } catch (cause) {
    const details = describeCause(cause);
    log.error({ path, errorCode: ErrorCode.RUBRIC_NOT_FOUND, details }, 'Rubric file could not be read');
    return err(createAppError(ErrorCode.RUBRIC_NOT_FOUND, `Rubric file '${path}' could not be read`, false, details));
  }

  const result = parseRubric(source);
  if (!result.ok) {
    log.error({ path, errorCode: result.error.code, details: result.error.details }, 'Rubric rejected');
    return result;
  }

  log.info({ path, stepKinds: Object.keys(result.value.nodes) }, 'Rubric loaded');
  return result;
}
