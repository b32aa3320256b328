/**
 * Default tool catalog per backend kind
 *
 * Used by the administrative UI to offer tool names before a connection has
 * ever been reached.
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

export type ToolCatalog = Readonly<Record<string, readonly string[]>>;

const ToolCatalogSchema = z.record(z.array(z.string().min(1)));

/**
 * Load a catalog file mapping backend kind to tool names
 */
export function loadToolCatalog(filePath: string): ToolCatalog {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return ToolCatalogSchema.parse(raw);
}

const defaultCatalogPath = path.join(path.dirname(fileURLToPath(import.meta.url)), 'default-tools.json');

export const DEFAULT_TOOL_CATALOG: ToolCatalog = loadToolCatalog(defaultCatalogPath);
