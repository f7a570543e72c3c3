import { readFile } from 'node:fs/promises';
import fs from 'node:fs';
import path from 'node:path';

export type PromptName =
  | 'segment_classifier_system'
  | 'segment_classifier_user';

let loaded = false;
const PROMPTS: Partial<Record<PromptName, string>> = {};
const memo = new Map<string, string>();

async function loadFileSafe(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch {
    return '';
  }
}

export async function preloadPrompts(): Promise<void> {
  if (loaded) return;

  const candidates: string[] = [];
  if (process.env.PROMPTS_DIR) candidates.push(path.resolve(process.env.PROMPTS_DIR));
  candidates.push(path.join(__dirname, '..', 'prompts'));
  candidates.push(path.join(process.cwd(), 'src', 'prompts'));

  const base = candidates.find((c) => fs.existsSync(c)) || path.join(process.cwd(), 'src', 'prompts');

  const assign = async (name: PromptName, file: string) => {
    PROMPTS[name] = (await loadFileSafe(path.join(base, file))).trim();
  };

  await Promise.all([
    assign('segment_classifier_system', 'segment_classifier_system.md'),
    assign('segment_classifier_user', 'segment_classifier_user.md'),
  ]);

  loaded = true;
}

export async function getPrompt(name: PromptName): Promise<string> {
  const hit = memo.get(name);
  if (hit !== undefined) return hit;
  if (!loaded) await preloadPrompts();
  const text = PROMPTS[name] ?? '';
  memo.set(name, text);
  return text;
}

/**
 * Substitutes `{key}` placeholders; unknown placeholders are left as-is.
 */
export function fillPrompt(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{([a-z_]+)\}/g, (whole, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? String(values[key]) : whole,
  );
}
