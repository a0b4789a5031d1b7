import { Attachment, ProjectBrief } from '@pagelaunch/shared';

const DATA_URI_PATTERN = /^data:([^,]*?)(;base64)?,(.*)$/s;

/**
 * Decodes a `data:` URI attachment to text. Anything that is not a data URI
 * decodes to an empty string.
 */
export function decodeAttachment(attachment: Attachment): string {
  const match = DATA_URI_PATTERN.exec(attachment.url);
  if (!match) {
    console.warn(`[Prompts] Error decoding attachment ${attachment.name}: not a data URI`);
    return '';
  }
  const [, , base64, payload] = match;
  if (base64) {
    return Buffer.from(payload, 'base64').toString('utf8');
  }
  try {
    return decodeURIComponent(payload);
  } catch {
    return payload;
  }
}

function formatChecks(checks: string[]): string {
  if (checks.length === 0) {
    return '- (none)';
  }
  return checks.map((check) => `- ${check}`).join('\n');
}

function formatAttachments(attachments: Attachment[] = []): string {
  return attachments
    .map((attachment) => {
      const content = decodeAttachment(attachment);
      return `--- Attachment: ${attachment.name} ---\n${content}\n--- End Attachment ---`;
    })
    .join('\n\n');
}

export function buildCreatePrompt(brief: ProjectBrief): string {
  const sections = [
    "You are an expert web developer. Your task is to create a complete, self-contained 'index.html' file.",
    'All CSS and JavaScript must be included directly within the HTML file. Do not use external files.',
    '',
    '**Project Brief:**',
    brief.brief,
  ];

  const attachments = formatAttachments(brief.attachments);
  if (attachments) {
    sections.push('', '**Attachments Content:**', attachments);
  }

  sections.push(
    '',
    '**Evaluation Checks:**',
    'The final application will be evaluated against these checks. Make sure the generated code passes them:',
    formatChecks(brief.checks),
    '',
    '**Instructions:**',
    '1.  Create a single `index.html` file.',
    '2.  Embed all necessary JavaScript and CSS within `<script>` and `<style>` tags.',
    '3.  Ensure the code is clean, functional, and directly addresses the brief and checks.',
    '4.  The final output should ONLY be the HTML code, nothing else. Start with `<!DOCTYPE html>` and end with `</html>`.'
  );

  return sections.join('\n');
}

export function buildRevisePrompt(brief: ProjectBrief, existingCode: string): string {
  return [
    "You are an expert web developer. Your task is to update an existing 'index.html' file based on new requirements.",
    'The updated code must remain a single, self-contained HTML file.',
    '',
    '**New Brief / Revision Request:**',
    brief.brief,
    '',
    '**Evaluation Checks for this Revision:**',
    'The updated application will be evaluated against these checks. Ensure the code passes them:',
    formatChecks(brief.checks),
    '',
    '**Existing `index.html` Code:**',
    '```html',
    existingCode,
    '```',
    '',
    '**Instructions:**',
    '1.  Modify the provided HTML code to meet the new requirements.',
    '2.  Ensure the result is still a single, self-contained `index.html` file.',
    '3.  The final output should ONLY be the complete, updated HTML code. Start with `<!DOCTYPE html>` and end with `</html>`.',
  ].join('\n');
}
