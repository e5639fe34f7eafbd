import { CLOSE_MARKER, DIVIDER_MARKER, SEARCH_MARKER } from '@mender/repo';
import { fenceLanguage, type Issue, type ModelRequest } from '@mender/shared';

/**
 * Follow-up instructions appended to the failure note of a retry. The second
 * entry is reused for every attempt after it.
 */
export const ESCALATION_NOTES = [
  'Point at the exact lines that still fail verification, name their rule IDs, and edit strictly around those lines.',
  'Change only the lines around the remaining failures; leave unrelated sections untouched and do not reformat the file.',
] as const;

export const SYSTEM_PROMPT = `You are a code remediation assistant. Fix the reported issues with SEARCH/REPLACE blocks.
Return only the changed lines, never the whole file.

Use this exact format for every change:
${SEARCH_MARKER}
[lines copied exactly from the file]
${DIVIDER_MARKER}
[corrected lines]
${CLOSE_MARKER}

Emit one block per change. Copy the SEARCH lines exactly as they appear in the file, including indentation.`;

export interface PromptInput {
  /** Repository-relative path of the file being fixed */
  filePath: string;
  issues: Issue[];
  /** Original file content */
  content: string;
  /** 1-based attempt number */
  attempt: number;
  /** Why the previous attempt failed */
  failureNote?: string;
  /** Rule guidance from the failure history */
  guidance?: string;
}

export interface PromptBuilderOptions {
  maxTokens?: number;
  temperature?: number;
}

export function formatIssueLine(issue: Issue): string {
  return `- Line ${issue.line} (Rule: ${issue.ruleId}): ${issue.message} | Code: ${issue.codeSnippet.trim()}`;
}

export function escalationNote(attempt: number, failureNote: string): string {
  const index = Math.min(attempt - 2, ESCALATION_NOTES.length - 1);
  return `PREVIOUS ATTEMPT ${attempt - 1} FAILED: ${failureNote}. ${ESCALATION_NOTES[index]}`;
}

export class PromptBuilder {
  constructor(private readonly options: PromptBuilderOptions = {}) {}

  build(input: PromptInput): ModelRequest {
    const sections: string[] = [];

    sections.push(
      input.issues.length > 0
        ? `ISSUES:\n${input.issues.map(formatIssueLine).join('\n')}`
        : 'ISSUES:\nNo issue details available.',
    );

    const examples = fixExamples(input.issues);
    if (examples.length > 0) {
      sections.push(`FIX EXAMPLES:\n${examples.join('\n\n')}`);
    }

    const body = input.content.endsWith('\n') ? input.content : `${input.content}\n`;
    sections.push(`FILE CONTENT (${input.filePath}):\n\`\`\`${fenceLanguage(input.filePath)}\n${body}\`\`\``);

    if (input.attempt > 1) {
      sections.push(escalationNote(input.attempt, input.failureNote || 'no details recorded'));
    }
    if (input.guidance) {
      sections.push(`RULE GUIDANCE: ${input.guidance}`);
    }

    return {
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: sections.join('\n\n') },
      ],
      maxTokens: this.options.maxTokens,
      temperature: this.options.temperature,
    };
  }
}

function fixExamples(issues: Issue[]): string[] {
  const seen = new Set<string>();
  const examples: string[] = [];
  for (const issue of issues) {
    if (!issue.fixExample || seen.has(issue.ruleId)) continue;
    seen.add(issue.ruleId);
    examples.push(`Rule ${issue.ruleId}:\n${issue.fixExample}`);
  }
  return examples;
}
