import { z } from 'zod';

import { errorMessage, VoterUnavailable } from '../core/errors.js';
import { Finding, type Vote } from '../core/work-item/types.js';
import { describeFailure, expandArgs, runCommand, type CommandRunner } from './process.js';
import type { ReviewRequest, Voter } from './types.js';

const MAX_DIFF_CHARS = 50_000;

const VotePayload = z.object({
  // Anything other than an explicit pass counts against the change.
  verdict: z
    .string()
    .optional()
    .transform((v): 'pass' | 'fail' => (v?.trim().toLowerCase() === 'pass' ? 'pass' : 'fail')),
  confidence: z.number().optional(),
  findings: z.array(Finding).catch([]).default([]),
  summary: z.string().catch('').default('')
});

/** Strip a surrounding markdown code fence, if the reply has one. */
export function stripCodeFence(raw: string): string {
  const text = raw.trim();
  const fenced = /```[a-zA-Z]*\s*\n([\s\S]*?)\n\s*```/.exec(text);
  return fenced ? fenced[1].trim() : text;
}

/** Parse a reviewer's JSON reply into a vote; unparsable output means the voter did not respond. */
export function parseVote(raw: string, voter: string, now: Date): Vote {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFence(raw));
  } catch (err) {
    throw new VoterUnavailable(voter, `reply is not JSON: ${errorMessage(err)}`, { cause: err });
  }

  const parsed = VotePayload.safeParse(json);
  if (!parsed.success) throw new VoterUnavailable(voter, 'reply is not a JSON object');

  const { verdict, confidence, findings, summary } = parsed.data;
  return {
    voter,
    verdict,
    findings,
    summary,
    confidence: confidence === undefined ? undefined : Math.min(1, Math.max(0, confidence)),
    timestamp: now.toISOString()
  };
}

/** Review request as plain text: diff, proposal, brief, project rules and checks. */
export function formatReviewRequest(req: ReviewRequest): string {
  const diff = req.diff.length > MAX_DIFF_CHARS ? `${req.diff.slice(0, MAX_DIFF_CHARS)}\n… (diff truncated)` : req.diff;
  const out = [
    `# Review: ${req.item.title} (${req.item.id})`,
    '',
    'Reply with JSON only: {"verdict": "pass"|"fail", "confidence": 0..1, "findings": [{"severity": "info"|"warning"|"critical", "category": "...", "description": "..."}], "summary": "..."}',
    '',
    '## Diff',
    '',
    '```diff',
    diff || '(no changes)',
    '```',
    '',
    '## Proposal',
    '',
    req.item.proposal.trim(),
    '',
    '## Brief',
    '',
    req.brief.trim()
  ];
  if (req.projectRules?.trim()) out.push('', '## Project rules', '', req.projectRules.trim());
  if (req.checks.length) out.push('', '## Required checks', '', ...req.checks.map((c) => `- ${c}`));
  return `${out.join('\n')}\n`;
}

export interface CommandVoterOptions {
  id: string;
  command: string;
  args: readonly string[];
  model?: string;
  cwd: string;
  runner?: CommandRunner;
  now?: () => Date;
}

export class CommandVoter implements Voter {
  readonly id: string;
  private readonly run: CommandRunner;
  private readonly now: () => Date;

  constructor(private readonly opts: CommandVoterOptions) {
    this.id = opts.id;
    this.run = opts.runner ?? runCommand;
    this.now = opts.now ?? (() => new Date());
  }

  async review(req: ReviewRequest, signal: AbortSignal): Promise<Vote> {
    const model = req.model ?? this.opts.model;
    const outcome = await this.run({
      command: this.opts.command,
      args: expandArgs(this.opts.args, { model, change: req.item.id }),
      cwd: this.opts.cwd,
      input: formatReviewRequest(req),
      signal
    });

    if (outcome.cancelled) throw new VoterUnavailable(this.id, 'cancelled');
    if (outcome.timedOut) throw new VoterUnavailable(this.id, 'timed out');
    if (outcome.failed) throw new VoterUnavailable(this.id, describeFailure(outcome));

    return parseVote(outcome.stdout, this.id, this.now());
  }
}
