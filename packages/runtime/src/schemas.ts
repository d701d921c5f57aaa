import { z } from "zod";

/** Result of the language step. Missing or malformed fields fall back. */
export const LanguageAnalysisSchema = z.object({
  detected_language: z.string().nullish().catch(null),
  language_name: z.string().nullish().catch(null),
  english_translation: z.string().nullish().catch(null),
  is_travel_related: z.boolean().optional().catch(undefined),
  service_type: z.string().nullish().catch(null),
  is_complete: z.boolean().optional().catch(undefined),
  missing_info: z.array(z.string()).optional().catch(undefined),
  followup_question: z.string().nullish().catch(null),
});

export type LanguageAnalysis = z.infer<typeof LanguageAnalysisSchema>;

export const BookingRequestSchema = z.object({
  service_type: z.string(),
  option_index: z.coerce.number().int().positive(),
});

export type BookingRequest = z.infer<typeof BookingRequestSchema>;

/** Follow-up step reply when the model answers in JSON. */
export const FollowupReplySchema = z.object({
  answer: z.string(),
  booking: BookingRequestSchema.nullish().catch(null),
});

export type FollowupReply = z.infer<typeof FollowupReplySchema>;
