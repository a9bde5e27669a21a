import type { Request, Response } from 'express';
import type { Logger } from 'pino';
import type { TtsService } from './tts.service';
import type { SynthesizeBody } from './tts.validation';
import { countCharacters } from './tts.validation';

type SynthesizeRequest = Request<Record<string, string>, unknown, SynthesizeBody>;

export const createTtsController = ({ ttsService, logger }: { ttsService: TtsService; logger: Logger }) => ({
  synthesize: async (req: SynthesizeRequest, res: Response) => {
    const { text } = req.body;
    const voiceId = req.body.voice_id ?? null;
    const textLength = countCharacters(text);

    const result = await ttsService.synthesize(text, voiceId);

    if (!result.ok) {
      const { error } = result;
      logger.error({ ...error.toLogObject(), text_length: textLength, ip: req.ip }, 'speech generation failed');
      return res.status(error.statusCode >= 500 ? 500 : 400).json({
        success: false,
        message: error.message,
        error_code: error.statusCode,
      });
    }

    logger.info(
      {
        text_length: textLength,
        voice_id: voiceId,
        audio_url: result.value,
        ip: req.ip,
        user_agent: req.get('user-agent') ?? null,
      },
      'speech generated'
    );

    return res.status(200).json({
      success: true,
      message: 'audio generated successfully',
      audio_url: result.value,
      text_length: textLength,
    });
  },

  listVoices: async (_req: Request, res: Response) => {
    const result = await ttsService.listVoices();

    if (!result.ok) {
      return res.status(400).json({ success: false, message: result.error.message });
    }

    res.setHeader('Cache-Control', 'no-store');
    return res.status(200).json({ success: true, voices: result.value });
  },
});

export type TtsController = ReturnType<typeof createTtsController>;
