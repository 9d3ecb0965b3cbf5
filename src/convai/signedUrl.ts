import { z } from 'zod';
import { ConversationConnectError } from '../errors';
import { defaultFetch, HttpFetch, isAbortError, safeReadBody, truncateForLog } from '../http';
import { log } from '../log';

const SignedUrlResponseSchema = z.object({
  signed_url: z.string().url(),
});

export interface SignedUrlRequest {
  apiBaseUrl: string;
  apiKey: string;
  agentId: string;
  signal?: AbortSignal;
  fetchImpl?: HttpFetch;
}

/**
 * Private agents need a short-lived URL minted with the account key. The
 * caller's signal bounds the request; the promise settles once it aborts.
 */
export async function fetchSignedConversationUrl(request: SignedUrlRequest): Promise<string> {
  const fetchImpl = request.fetchImpl ?? defaultFetch;
  const url = new URL('/v1/convai/conversation/get-signed-url', request.apiBaseUrl);
  url.searchParams.set('agent_id', request.agentId);

  const signal = request.signal;
  let rejectAborted: (error: Error) => void = () => undefined;
  const aborted = new Promise<never>((_resolve, reject) => {
    rejectAborted = reject;
  });
  const onAbort = (): void => rejectAborted(new ConversationConnectError('aborted'));
  if (signal?.aborted) {
    onAbort();
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }

  try {
    const response = await Promise.race([
      fetchImpl(url.toString(), {
        method: 'GET',
        headers: { 'xi-api-key': request.apiKey, Accept: 'application/json' },
        signal,
      }),
      aborted,
    ]);
    const body = await Promise.race([safeReadBody(response), aborted]);

    if (!response.ok) {
      log.error(
        { event: 'convai_signed_url_failed', status: response.status, body: truncateForLog(body, 500) },
        'signed url request failed',
      );
      throw new ConversationConnectError('signed_url_failed', `status ${response.status}`);
    }

    const parsed = SignedUrlResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ConversationConnectError('signed_url_failed', 'response missing signed_url');
    }
    return parsed.data.signed_url;
  } catch (error) {
    if (error instanceof ConversationConnectError) throw error;
    if (signal?.aborted || isAbortError(error)) throw new ConversationConnectError('aborted');
    throw new ConversationConnectError('signed_url_failed', String(error));
  } finally {
    signal?.removeEventListener('abort', onAbort);
  }
}
