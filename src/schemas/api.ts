import { z } from 'zod';

export const ResolveQuerySchema = z.object({
  host: z.string({ required_error: 'host is required' }),
});

export const HttpCheckQuerySchema = z.object({
  url: z.string({ required_error: 'url is required' }).min(1),
});

export const BotCommandBodySchema = z.object({
  text: z.string().min(1),
});

export type ResolveQuery = z.infer<typeof ResolveQuerySchema>;
export type HttpCheckQuery = z.infer<typeof HttpCheckQuerySchema>;
export type BotCommandBody = z.infer<typeof BotCommandBodySchema>;
