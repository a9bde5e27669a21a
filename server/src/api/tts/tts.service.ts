import crypto from 'crypto';
import { z } from 'zod';
import type { Logger } from 'pino';
import type { AudioDisk } from '../../storage/disk';
import { joinStoragePath } from '../../storage/paths';
import { SynthesisError } from '../../utils/errors';
import { err, ok } from '../../utils/result';
import type { Result } from '../../utils/result';
import {
  classifyUpstreamStatus,
  describeUpstreamFailure,
  fetchSpeech,
  fetchVoices,
  readResponseBody,
  speechUrl,
} from './tts.elevenlabs.upstream';
import type { ElevenLabsSettings } from './tts.elevenlabs.upstream';
import { TEXT_MAX_LENGTH, countCharacters } from './tts.validation';

export type VoiceSummary = {
  id: string;
  name: string | null;
  category: string | null;
};

export const VOICES_UNAVAILABLE_MESSAGE = 'error fetching available voices';

const voicesPayloadSchema = z.object({
  voices: z.array(z.unknown()).nullish(),
});

const voiceEntrySchema = z.object({
  voice_id: z.string(),
  name: z.string().nullish(),
  category: z.string().nullish(),
});

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

const connectionFailure = (error: unknown) =>
  new SynthesisError('connection_failed', `error connecting to remote speech API: ${errorMessage(error)}`, 500, {
    cause: error,
  });

const validateText = (text: string): SynthesisError | null => {
  if (!text.trim()) {
    return new SynthesisError('invalid_text', 'text must not be empty', 400);
  }
  if (countCharacters(text) > TEXT_MAX_LENGTH) {
    return new SynthesisError('invalid_text', `text exceeds the ${TEXT_MAX_LENGTH} character limit`, 400);
  }
  return null;
};

type TtsServiceDeps = {
  settings: ElevenLabsSettings;
  disk: AudioDisk;
  storagePath: string;
  logger: Logger;
};

export const createTtsService = ({ settings, disk, storagePath, logger }: TtsServiceDeps) => {
  const fetchAudio = async (text: string, voiceId: string): Promise<Result<Buffer, SynthesisError>> => {
    try {
      const res = await fetchSpeech(settings, text, voiceId);

      if (!res.ok) {
        const body = await readResponseBody(res);
        const failure = classifyUpstreamStatus(res.status, body);
        return err(new SynthesisError(failure.kind, describeUpstreamFailure(failure), failure.status, { responseBody: body }));
      }

      const audio = Buffer.from(await res.arrayBuffer());
      if (!audio.length) {
        return err(new SynthesisError('empty_response', 'response body is empty', 500));
      }
      return ok(audio);
    } catch (error) {
      return err(connectionFailure(error));
    }
  };

  const fetchVoiceCatalog = async (): Promise<Result<{ status: number; body: unknown }, SynthesisError>> => {
    try {
      const res = await fetchVoices(settings);
      return ok({ status: res.status, body: await readResponseBody(res) });
    } catch (error) {
      return err(connectionFailure(error));
    }
  };

  return {
    /**
     * Synthesizes `text` with the given voice (or the configured default), stores the MP3
     * and resolves to its public URL. The file is fully written before the URL is returned.
     */
    async synthesize(text: string, voiceId?: string | null): Promise<Result<string, SynthesisError>> {
      const invalid = validateText(text);
      if (invalid) return err(invalid);

      const voice = voiceId && voiceId.trim() ? voiceId : settings.defaultVoiceId;

      logger.info(
        {
          url: speechUrl(settings, voice),
          voice_id: voice,
          text_length: countCharacters(text),
          model: settings.modelId,
        },
        'speech synthesis request'
      );

      const fetched = await fetchAudio(text, voice);
      if (!fetched.ok) {
        logger.error(fetched.error.toLogObject(), 'speech synthesis failed');
        return fetched;
      }

      const audio = fetched.value;
      const filename = `tts_${crypto.randomUUID()}.mp3`;
      const objectPath = joinStoragePath(storagePath, filename);

      try {
        await disk.put(objectPath, audio);
      } catch (error) {
        const failure = new SynthesisError('storage_failed', 'failed to store generated audio', 500, { cause: error });
        logger.error({ ...failure.toLogObject(), err: error, path: objectPath }, 'speech synthesis failed');
        return err(failure);
      }

      const url = disk.url(objectPath);
      logger.info({ filename, size_bytes: audio.length, url }, 'speech synthesized');
      return ok(url);
    },

    async listVoices(): Promise<Result<VoiceSummary[], SynthesisError>> {
      const fetched = await fetchVoiceCatalog();
      if (!fetched.ok) {
        logger.error(fetched.error.toLogObject(), 'voice catalog request failed');
        return fetched;
      }

      const { status, body } = fetched.value;
      if (status < 200 || status >= 300) {
        const failure = new SynthesisError('voices_unavailable', VOICES_UNAVAILABLE_MESSAGE, status, { responseBody: body });
        logger.error(failure.toLogObject(), 'voice catalog request failed');
        return err(failure);
      }

      const parsed = voicesPayloadSchema.safeParse(body);
      if (!parsed.success) {
        const failure = new SynthesisError('voices_unavailable', VOICES_UNAVAILABLE_MESSAGE, 502, {
          responseBody: body,
          cause: parsed.error,
        });
        logger.error(failure.toLogObject(), 'voice catalog response was malformed');
        return err(failure);
      }

      const entries = parsed.data.voices ?? [];
      const voices: VoiceSummary[] = [];
      for (const entry of entries) {
        const voice = voiceEntrySchema.safeParse(entry);
        if (!voice.success) continue;
        voices.push({
          id: voice.data.voice_id,
          name: voice.data.name ?? null,
          category: voice.data.category ?? null,
        });
      }

      if (voices.length < entries.length) {
        logger.warn({ dropped: entries.length - voices.length }, 'voice catalog entries without a voice_id were dropped');
      }
      return ok(voices);
    },
  };
};

export type TtsService = ReturnType<typeof createTtsService>;
