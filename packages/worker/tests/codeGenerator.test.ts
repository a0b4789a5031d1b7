import { LLMProvider } from '@pagelaunch/shared';
import { LLMClient } from '../src/llm/client';
import { LLMCodeGenerator } from '../src/llm/codeGenerator';

class ScriptedClient implements LLMClient {
  readonly provider: LLMProvider = 'gemini';
  prompts: string[] = [];

  constructor(private output: string) {}

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.output;
  }
}

describe('LLMCodeGenerator', () => {
  const brief = { task: 'my-site', brief: 'A counter page', checks: ['Has a button'] };

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('generates an artifact set from the create prompt', async () => {
    const client = new ScriptedClient('```html\n<html>counter</html>\n```');

    await expect(new LLMCodeGenerator(client).generate(brief)).resolves.toEqual({ 'index.html': '<html>counter</html>' });
    expect(client.prompts).toHaveLength(1);
    expect(client.prompts[0]).toContain('**Project Brief:**\nA counter page');
  });

  it('passes the existing code to the revision prompt', async () => {
    const client = new ScriptedClient('<html>counter v2</html>');

    await expect(new LLMCodeGenerator(client).revise(brief, '<html>counter</html>')).resolves.toEqual({
      'index.html': '<html>counter v2</html>',
    });
    expect(client.prompts[0]).toContain('```html\n<html>counter</html>\n```');
  });

  it('propagates unparseable output as a failure', async () => {
    await expect(new LLMCodeGenerator(new ScriptedClient('')).generate(brief)).rejects.toThrow('LLM returned empty output');
  });
});
