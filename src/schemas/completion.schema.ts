import { z } from 'zod';

/** The part of a chat-completions response this service reads. */
export const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().trim().min(1),
        }),
      })
    )
    .nonempty(),
});

export const completionText = (response: unknown): string => {
  const parsed = chatCompletionSchema.safeParse(response);
  if (!parsed.success) {
    throw new Error('Completion response has no message content.');
  }
  return parsed.data.choices[0].message.content;
};
