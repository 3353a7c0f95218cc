import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { DocumentOutline, OutlineSerializationOptions } from '../types/outline.js';

export function serializeOutline(outline: DocumentOutline, options: OutlineSerializationOptions = {}): string {
  // Rebuild the object so only the published fields reach the JSON
  const payload: DocumentOutline = {
    title: outline.title,
    outline: outline.outline.map(({ level, text, page }) => ({ level, text, page }))
  };
  return JSON.stringify(payload, null, options.indent ?? 2);
}

export async function writeOutlineFile(
  path: string,
  outline: DocumentOutline,
  options: OutlineSerializationOptions = {}
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${serializeOutline(outline, options)}\n`, 'utf-8');
}
