import { z } from 'zod';
import { ArtifactSet } from '@pagelaunch/shared';
import { LLMError } from '../errors';

export const filesOutputSchema = z.object({
  files: z.record(z.string(), z.string()),
});

/**
 * Removes one surrounding markdown code fence, with or without a language tag.
 */
export function stripCodeFences(text: string): string {
  let code = text.trim();
  if (code.startsWith('```')) {
    const newline = code.indexOf('\n');
    code = newline === -1 ? '' : code.slice(newline + 1);
  }
  if (code.endsWith('```')) {
    code = code.slice(0, -3);
  }
  return code.trim();
}

export function normalizeArtifactPath(filePath: string): string {
  const normalized = filePath.trim().replace(/\\/g, '/').replace(/^(\.\/)+/, '');
  const segments = normalized.split('/');
  if (
    normalized.length === 0 ||
    normalized.startsWith('/') ||
    /^[A-Za-z]:/.test(normalized) ||
    segments.some((segment) => segment === '' || segment === '.' || segment === '..' || segment.toLowerCase() === '.git')
  ) {
    throw new LLMError(`Generated output contains an invalid file path: ${filePath}`);
  }
  return normalized;
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Turns model output into an artifact set. A JSON object of the form
 * `{ "files": { "<path>": "<content>" } }` yields several files; any other
 * text is taken as the body of `index.html`.
 */
export function parseArtifacts(output: string): ArtifactSet {
  const code = stripCodeFences(output);
  if (!code) {
    throw new LLMError('LLM returned empty output');
  }

  if (code.startsWith('{')) {
    const parsed = filesOutputSchema.safeParse(tryParseJson(code));
    if (parsed.success) {
      const artifacts: ArtifactSet = {};
      for (const [filePath, content] of Object.entries(parsed.data.files)) {
        artifacts[normalizeArtifactPath(filePath)] = content;
      }
      if (Object.keys(artifacts).length === 0) {
        throw new LLMError('LLM returned no files');
      }
      return artifacts;
    }
  }

  return { 'index.html': code };
}
