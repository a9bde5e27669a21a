import { z } from 'zod';

export const TEXT_MAX_LENGTH = 5000;
export const VOICE_ID_MAX_LENGTH = 100;

// Counts code points, so an emoji is one character rather than two UTF-16 units.
export const countCharacters = (text: string): number => Array.from(text).length;

export const synthesizeBodySchema = z.object({
  text: z
    .string({
      required_error: 'the text field is required.',
      invalid_type_error: 'the text field must be a string.',
    })
    .refine((text) => text.trim().length > 0, 'the text field is required.')
    .refine((text) => countCharacters(text) <= TEXT_MAX_LENGTH, `the text may not exceed ${TEXT_MAX_LENGTH} characters.`),
  voice_id: z
    .string({ invalid_type_error: 'voice_id must be a string.' })
    .max(VOICE_ID_MAX_LENGTH, 'voice_id is invalid.')
    .nullish(),
});

export type SynthesizeBody = z.infer<typeof synthesizeBodySchema>;
