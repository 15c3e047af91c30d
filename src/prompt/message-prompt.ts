import type { InteractionDeps } from '../deps.js';
import { ConfigurationError } from '../errors.js';
import { Deadline, assertPositiveSeconds } from '../events/deadline.js';
import { raceEvent } from '../events/race.js';
import type { MessageEvent } from '../platform/types.js';

export type MessagePromptParams = {
  /** Only messages sent in this channel count. */
  channelId: string;
  userId: string;
  timeoutSeconds: number;
  signal?: AbortSignal;
};

/**
 * Wait for the next message `userId` sends in `channelId`. Resolves `null`
 * on timeout or abort.
 */
export async function messagePrompt(
  deps: InteractionDeps,
  params: MessagePromptParams,
): Promise<MessageEvent | null> {
  const { messageEvents } = deps;
  if (!messageEvents) {
    throw new ConfigurationError('messagePrompt requires a message event source');
  }
  assertPositiveSeconds(params.timeoutSeconds, 'timeoutSeconds');
  if (params.signal?.aborted) return null;

  const subscription = messageEvents.subscribe({
    channelId: params.channelId,
    authorId: params.userId,
  });
  const deadline = Deadline.after(params.timeoutSeconds);
  try {
    const result = await raceEvent(subscription, { deadlines: [deadline], signal: params.signal });
    return result.kind === 'event' ? result.event : null;
  } finally {
    subscription.cancel();
    deadline.cancel();
  }
}

/** Like `messagePrompt`, resolving only the message text. */
export async function messagePromptContent(
  deps: InteractionDeps,
  params: MessagePromptParams,
): Promise<string | null> {
  const message = await messagePrompt(deps, params);
  return message ? message.content : null;
}
