/**
 * File-system boundary
 */

import * as fs from 'node:fs';
import { ResourceNotFoundError, err, ok, type Result } from '@syslang/core';

export function readText(file: string): Result<string, ResourceNotFoundError> {
  try {
    return ok(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'EISDIR')) {
      return err(new ResourceNotFoundError(file));
    }
    throw error;
  }
}

export function writeText(file: string, text: string): void {
  fs.writeFileSync(file, text, 'utf-8');
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
