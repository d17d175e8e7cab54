/**
 * The conversation loop behind the CLI.
 *
 * Each turn sends one observation through the wrapper, reports the reply and
 * appends it to the transcript. A blank or missing follow-up ends the session.
 */

import type { Backend, ChatPrompt, ChatWrapper } from '@bessie/core';

import type { ProgressIndicator } from './thinking.js';
import type { Transcript } from './transcript.js';

export interface SessionOptions {
  backend: Backend<ChatPrompt>;
  wrapper: ChatWrapper;
  transcript: Transcript;
  firstObservation: string;
  /** Stop after the first reply. */
  once?: boolean;
  readFollowUp: () => Promise<string | null>;
  onReply?: (reply: string) => void;
  indicator?: ProgressIndicator | null;
}

/** Resolves with the number of completed turns. */
export async function runSession({
  backend,
  wrapper,
  transcript,
  firstObservation,
  once = false,
  readFollowUp,
  onReply,
  indicator = null,
}: SessionOptions): Promise<number> {
  let observation = firstObservation;
  let turns = 0;

  for (;;) {
    indicator?.start();
    let reply: string;
    try {
      reply = await wrapper.run(backend, observation);
    } finally {
      indicator?.stop();
    }

    turns += 1;
    onReply?.(reply);
    await transcript.appendReply(reply);

    if (once) {
      return turns;
    }

    const followUp = await readFollowUp();
    if (!followUp) {
      return turns;
    }

    await transcript.appendFollowUp(followUp);
    observation = followUp;
  }
}
