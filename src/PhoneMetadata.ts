import { z } from 'zod';

export const phoneNumberDescSchema = z.object({
  nationalNumberPattern: z.string(),
  possibleLength: z.array(z.number().int().positive()).default([]),
  possibleLengthLocalOnly: z.array(z.number().int().positive()).default([]),
  exampleNumber: z.string().optional()
});

export const numberFormatSchema = z.object({
  pattern: z.string(),
  format: z.string(),
  leadingDigitsPattern: z.array(z.string()).default([]),
  nationalPrefixFormattingRule: z.string().optional(),
  nationalPrefixOptionalWhenFormatting: z.boolean().default(false),
  domesticCarrierCodeFormattingRule: z.string().optional()
});

/**
 * Formatting and validation rules for one region, or for one non-geographical calling
 * code (in which case `id` is "001").
 */
export const phoneMetadataSchema = z.object({
  id: z.string().min(1),
  countryCode: z.number().int().positive(),
  internationalPrefix: z.string().optional(),
  preferredInternationalPrefix: z.string().optional(),
  nationalPrefix: z.string().optional(),
  nationalPrefixForParsing: z.string().optional(),
  nationalPrefixTransformRule: z.string().optional(),
  preferredExtnPrefix: z.string().optional(),
  mainCountryForCode: z.boolean().default(false),
  leadingDigits: z.string().optional(),
  generalDesc: phoneNumberDescSchema,
  fixedLine: phoneNumberDescSchema.optional(),
  mobile: phoneNumberDescSchema.optional(),
  tollFree: phoneNumberDescSchema.optional(),
  premiumRate: phoneNumberDescSchema.optional(),
  sharedCost: phoneNumberDescSchema.optional(),
  voip: phoneNumberDescSchema.optional(),
  numberFormat: z.array(numberFormatSchema).default([]),
  intlNumberFormat: z.array(numberFormatSchema).default([])
});

export type PhoneNumberDesc = z.infer<typeof phoneNumberDescSchema>;
export type NumberFormat = z.infer<typeof numberFormatSchema>;
export type PhoneMetadata = z.infer<typeof phoneMetadataSchema>;
