import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { projectRoot } from './paths.js';

export async function loadPrompt(name: string): Promise<string> {
  const filePath = join(projectRoot(), 'prompts', name);
  return readFile(filePath, 'utf8');
}

/** Replaces every `{{KEY}}` placeholder; unknown placeholders are left as-is. */
export function fillPrompt(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{([A-Z_]+)\}\}/g, (placeholder, key: string) =>
    key in values ? values[key] ?? placeholder : placeholder
  );
}
