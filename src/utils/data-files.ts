/**
 * Loader for the JSON tables shipped under data/ at the package root.
 *
 * @module utils/data-files
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import type { z } from 'zod';
import { MCPError } from '../server/errors.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Same relative location from src/utils and dist/utils */
export const DATA_DIR = path.resolve(__dirname, '..', '..', 'data');

/**
 * Read and validate a JSON file. Relative names resolve against DATA_DIR.
 *
 * @throws MCPError CONFIGURATION_ERROR when the file is missing or malformed
 */
export function readJsonFile<T extends z.ZodTypeAny>(fileName: string, schema: T): z.infer<T> {
  const filePath = path.isAbsolute(fileName) ? fileName : path.join(DATA_DIR, fileName);

  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new MCPError('CONFIGURATION_ERROR', `Cannot read data file: ${filePath}`, {
      filePath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new MCPError('CONFIGURATION_ERROR', `Data file is not valid JSON: ${filePath}`, {
      filePath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new MCPError('CONFIGURATION_ERROR', `Data file has an unexpected shape: ${filePath}`, {
      filePath,
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return result.data;
}
