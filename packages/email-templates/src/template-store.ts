/**
 * Verification template store
 *
 * Operators can edit verification.html / verification.txt in the template
 * directory. Missing files are seeded from the rendered default template.
 */

import { existsSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { renderVerificationTemplate, type RenderedEmail } from './render.js';

export const VERIFICATION_HTML_FILE = 'verification.html';
export const VERIFICATION_TEXT_FILE = 'verification.txt';

export interface LoadVerificationTemplateOptions {
  /** Directory holding operator-editable templates; rendered defaults are used when omitted */
  directory?: string;
}

async function readOrSeed(path: string, fallback: () => Promise<string>): Promise<string> {
  if (!existsSync(path)) {
    await writeFile(path, await fallback(), 'utf-8');
  }
  return readFile(path, 'utf-8');
}

export async function loadVerificationTemplate(
  options: LoadVerificationTemplateOptions = {}
): Promise<RenderedEmail> {
  if (!options.directory) {
    return renderVerificationTemplate();
  }

  const directory = options.directory;
  await mkdir(directory, { recursive: true });

  let defaults: Promise<RenderedEmail> | undefined;
  const rendered = () => {
    defaults ??= renderVerificationTemplate();
    return defaults;
  };

  const html = await readOrSeed(join(directory, VERIFICATION_HTML_FILE), async () => (await rendered()).html);
  const text = await readOrSeed(join(directory, VERIFICATION_TEXT_FILE), async () => (await rendered()).text);

  return { html, text };
}
