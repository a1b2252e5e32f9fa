import { z } from 'zod';
import { requiredText } from './recommendation.schema';

export const openFdaLabelSchema = z.object({
  openfda: z.object({
    brand_name: z.array(requiredText).nonempty(),
  }),
  dosage_and_administration: z.array(requiredText).nonempty(),
  indications_and_usage: z.array(requiredText).nonempty(),
});

export const openFdaSearchSchema = z.object({
  results: z.array(z.unknown()).default([]),
});
