import { ArtifactSet, ProjectBrief } from '@pagelaunch/shared';
import { LLMClient } from './client';
import { parseArtifacts } from './artifactParser';
import { buildCreatePrompt, buildRevisePrompt } from './prompts';

export interface CodeGenerator {
  generate(brief: ProjectBrief): Promise<ArtifactSet>;
  revise(brief: ProjectBrief, existingCode: string): Promise<ArtifactSet>;
}

export class LLMCodeGenerator implements CodeGenerator {
  constructor(private client: LLMClient) {}

  async generate(brief: ProjectBrief): Promise<ArtifactSet> {
    console.log(`[LLM] Generating code for task ${brief.task} with ${this.client.provider}`);
    const output = await this.client.complete(buildCreatePrompt(brief));
    return parseArtifacts(output);
  }

  async revise(brief: ProjectBrief, existingCode: string): Promise<ArtifactSet> {
    console.log(`[LLM] Revising code for task ${brief.task} with ${this.client.provider}`);
    const output = await this.client.complete(buildRevisePrompt(brief, existingCode));
    return parseArtifacts(output);
  }
}
