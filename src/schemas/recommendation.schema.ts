import { z } from 'zod';
import { Medication, RecommendationBundle } from '../types/RecommendationTypes';
import { firstSentence } from '../utils/text';

export const requiredText = z.string().refine((value) => value.trim().length > 0, {
  message: 'Expected non-blank text',
});

export const medicationSchema = z.object({
  name: requiredText,
  dosage: requiredText,
  purpose: requiredText,
});

export const toMedication = (item: z.infer<typeof medicationSchema>): Medication => ({
  name: item.name.trim(),
  dosage: firstSentence(item.dosage),
  purpose: firstSentence(item.purpose),
});

const textList = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items
      .filter((item): item is string => typeof item === 'string')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

const medicationList = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items.flatMap((item) => {
      const parsed = medicationSchema.safeParse(item);
      return parsed.success ? [toMedication(parsed.data)] : [];
    })
  );

export const recommendationSchema = z.object({
  medications: medicationList,
  treatments: textList,
  precautions: textList,
  follow_up: textList,
});

export const emptyBundle = (): RecommendationBundle => ({
  medications: [],
  treatments: [],
  precautions: [],
  follow_up: [],
});

/**
 * Coerces whatever the model produced into a complete bundle. Absent or
 * malformed keys become empty lists; a non-object payload yields the empty
 * bundle.
 */
export const normalizeRecommendations = (raw: unknown): RecommendationBundle => {
  const parsed = recommendationSchema.safeParse(raw);
  return parsed.success ? parsed.data : emptyBundle();
};
