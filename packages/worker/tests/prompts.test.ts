import { ProjectBrief } from '@pagelaunch/shared';
import { buildCreatePrompt, buildRevisePrompt, decodeAttachment } from '../src/llm/prompts';

describe('prompts', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('decodeAttachment', () => {
    it('decodes a base64 data URI', () => {
      const url = `data:text/csv;base64,${Buffer.from('a,b\n1,2').toString('base64')}`;
      expect(decodeAttachment({ name: 'data.csv', url })).toBe('a,b\n1,2');
    });

    it('decodes a percent-encoded data URI', () => {
      expect(decodeAttachment({ name: 'note.txt', url: 'data:text/plain,hello%20world' })).toBe('hello world');
    });

    it('returns an empty string for other URLs', () => {
      expect(decodeAttachment({ name: 'remote.png', url: 'https://example.com/remote.png' })).toBe('');
    });
  });

  const brief: ProjectBrief = {
    task: 'captcha-solver',
    brief: 'Build a page that shows the uploaded image.',
    checks: ['Page has a title', 'Image is visible'],
    attachments: [{ name: 'sample.txt', url: `data:text/plain;base64,${Buffer.from('sample body').toString('base64')}` }],
  };

  it('builds the create prompt with brief, attachments and checks', () => {
    const prompt = buildCreatePrompt(brief);

    expect(prompt).toContain('**Project Brief:**\nBuild a page that shows the uploaded image.');
    expect(prompt).toContain('--- Attachment: sample.txt ---\nsample body\n--- End Attachment ---');
    expect(prompt).toContain('- Page has a title\n- Image is visible');
    expect(prompt).toContain('1.  Create a single `index.html` file.');
  });

  it('omits the attachments section when there are none', () => {
    const prompt = buildCreatePrompt({ ...brief, attachments: undefined });
    expect(prompt).not.toContain('**Attachments Content:**');
  });

  it('includes the existing code in the revision prompt', () => {
    const prompt = buildRevisePrompt({ ...brief, checks: [] }, '<html>old</html>');

    expect(prompt).toContain('**New Brief / Revision Request:**\nBuild a page that shows the uploaded image.');
    expect(prompt).toContain('```html\n<html>old</html>\n```');
    expect(prompt).toContain('Ensure the code passes them:\n- (none)');
  });
});
