import { z } from 'zod';
import type { Config } from '../../config';

export type ElevenLabsSettings = Config['elevenLabs'];

/** Failed remote responses, grouped by the status bands callers can act on. */
export type UpstreamFailure =
  | { kind: 'unauthorized'; status: number }
  | { kind: 'voice_not_found'; status: number }
  | { kind: 'invalid_parameters'; status: number; detail: string | null }
  | { kind: 'rate_limited'; status: number }
  | { kind: 'upstream_unavailable'; status: number }
  | { kind: 'upstream_error'; status: number };

const errorDetailSchema = z.object({
  detail: z.object({
    message: z.string(),
  }),
});

export const classifyUpstreamStatus = (status: number, body: unknown): UpstreamFailure => {
  switch (status) {
    case 401:
      return { kind: 'unauthorized', status };
    case 404:
      return { kind: 'voice_not_found', status };
    case 422: {
      const parsed = errorDetailSchema.safeParse(body);
      return { kind: 'invalid_parameters', status, detail: parsed.success ? parsed.data.detail.message : null };
    }
    case 429:
      return { kind: 'rate_limited', status };
    case 500:
    case 502:
    case 503:
      return { kind: 'upstream_unavailable', status };
    default:
      return { kind: 'upstream_error', status };
  }
};

export const describeUpstreamFailure = (failure: UpstreamFailure): string => {
  switch (failure.kind) {
    case 'unauthorized':
      return 'API key is invalid or unauthorized';
    case 'voice_not_found':
      return 'voice id not found';
    case 'invalid_parameters':
      return `invalid parameters: ${failure.detail ?? 'unknown error'}`;
    case 'rate_limited':
      return 'rate limit exceeded, retry shortly';
    case 'upstream_unavailable':
      return 'internal error in the remote speech API, retry';
    case 'upstream_error':
      return 'error calling remote speech API';
    default: {
      const unreachable: never = failure;
      return unreachable;
    }
  }
};

/** Parsed JSON when the body is JSON, the raw text otherwise, `null` when empty. */
export const readResponseBody = async (res: Response): Promise<unknown> => {
  const raw = await res.text();
  if (!raw) return null;
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return raw.slice(0, 2000);
  }
};

export const speechUrl = (settings: ElevenLabsSettings, voiceId: string) =>
  `${settings.baseUrl}/text-to-speech/${encodeURIComponent(voiceId)}`;

export const fetchSpeech = (settings: ElevenLabsSettings, text: string, voiceId: string) =>
  fetch(speechUrl(settings, voiceId), {
    method: 'POST',
    headers: {
      'xi-api-key': settings.apiKey,
      'Content-Type': 'application/json',
      Accept: 'audio/mpeg',
    },
    body: JSON.stringify({
      text,
      model_id: settings.modelId,
      voice_settings: settings.voiceSettings,
    }),
    signal: AbortSignal.timeout(settings.timeoutSeconds * 1000),
  });

export const fetchVoices = (settings: ElevenLabsSettings) =>
  fetch(`${settings.baseUrl}/voices`, {
    method: 'GET',
    headers: {
      'xi-api-key': settings.apiKey,
    },
    signal: AbortSignal.timeout(settings.timeoutSeconds * 1000),
  });
