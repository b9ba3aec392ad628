import type { ReviewRequest, Voter } from '../../collaborators/types.js';
import { errorMessage, VoterUnavailable } from '../errors.js';
import type { Logger } from '../../utils/logger.js';
import type { Vote } from '../work-item/types.js';

export interface NonResponse {
  voter: string;
  reason: string;
  timedOut: boolean;
}

export interface VoteCollection {
  votes: Vote[];
  nonResponses: NonResponse[];
}

export interface CollectOptions {
  /** Per-voter bound; a voter that has not answered by then is a non-response. */
  timeoutMs: number;
  signal?: AbortSignal;
  logger?: Logger;
}

type Outcome = { ok: true; vote: Vote } | { ok: false; miss: NonResponse };

/**
 * Ask every voter concurrently and wait for all of them, each bounded by its own timeout.
 *
 * Voter failures never reject; they come back as non-responses. Only cancellation of
 * `opts.signal` rejects, with the signal's reason.
 */
export async function collectVotes(
  voters: readonly Voter[],
  req: ReviewRequest,
  opts: CollectOptions
): Promise<VoteCollection> {
  opts.signal?.throwIfAborted();

  const outcomes = await Promise.all(voters.map((voter) => solicit(voter, req, opts)));
  opts.signal?.throwIfAborted();

  const votes: Vote[] = [];
  const nonResponses: NonResponse[] = [];
  for (const o of outcomes) {
    if (o.ok) votes.push(o.vote);
    else nonResponses.push(o.miss);
  }
  return { votes, nonResponses };
}

async function solicit(voter: Voter, req: ReviewRequest, opts: CollectOptions): Promise<Outcome> {
  const controller = new AbortController();
  const onAbort = () => controller.abort(opts.signal?.reason);
  opts.signal?.addEventListener('abort', onAbort, { once: true });

  let timer: NodeJS.Timeout | null = null;
  const timeout = new Promise<Outcome>((resolve) => {
    timer = setTimeout(() => {
      controller.abort(new VoterUnavailable(voter.id, `timed out after ${opts.timeoutMs}ms`));
      resolve({ ok: false, miss: { voter: voter.id, reason: `timed out after ${opts.timeoutMs}ms`, timedOut: true } });
    }, opts.timeoutMs);
  });

  const review = voter.review(req, controller.signal).then(
    (vote): Outcome => ({ ok: true, vote: { ...vote, voter: voter.id } }),
    (err: unknown): Outcome => {
      if (!(err instanceof VoterUnavailable)) {
        opts.logger?.warn('voter failed unexpectedly', { voter: voter.id, error: errorMessage(err) });
      }
      return { ok: false, miss: { voter: voter.id, reason: errorMessage(err), timedOut: false } };
    }
  );

  try {
    const outcome = await Promise.race([review, timeout]);
    if (!outcome.ok) opts.logger?.info('voter did not respond', outcome.miss);
    return outcome;
  } finally {
    if (timer) clearTimeout(timer);
    opts.signal?.removeEventListener('abort', onAbort);
  }
}
