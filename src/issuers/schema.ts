/**
 * Issuer Table Schema
 * Structural validation of issuer data before the database is built
 */

import { z } from 'zod';
import { MAX_ISSUER_LENGTH, MIN_ISSUER_LENGTH } from '../types/index.js';

const binPrefixSchema = z.string().regex(/^\d{6}$/, 'must be exactly six digits');

export const issuerRangeSourceSchema = z
  .object({
    start: binPrefixSchema,
    end: binPrefixSchema,
  })
  .refine((range) => Number(range.start) <= Number(range.end), {
    message: 'start must not be greater than end',
  });

export const issuerSourceSchema = z.object({
  issuer: z.string().trim().min(1, 'issuer id is required'),
  displayName: z.string().trim().min(1, 'displayName is required'),
  ranges: z.array(issuerRangeSourceSchema).min(1, 'at least one range is required'),
  lengths: z.array(z.number().int().min(MIN_ISSUER_LENGTH).max(MAX_ISSUER_LENGTH)).default([]),
  priority: z.number().int(),
  region: z.string().default('global'),
  active: z.boolean().default(true),
  notes: z.string().optional(),
});

export const issuerDatabaseSourceSchema = z
  .object({
    info: z.object({
      version: z.string().trim().min(1, 'version is required'),
      lastUpdated: z.string().default(''),
    }),
    issuers: z.array(issuerSourceSchema).min(1, 'at least one issuer is required'),
  })
  .superRefine((source, ctx) => {
    const seen = new Set<string>();
    source.issuers.forEach((issuer, index) => {
      if (seen.has(issuer.issuer)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['issuers', index, 'issuer'],
          message: `duplicate issuer id '${issuer.issuer}'`,
        });
      }
      seen.add(issuer.issuer);
    });

    if (!source.issuers.some((issuer) => issuer.active)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['issuers'],
        message: 'no active issuers',
      });
    }
  });

/** Issuer table as written in JSON (defaults not yet applied) */
export type IssuerDatabaseSourceInput = z.input<typeof issuerDatabaseSourceSchema>;

/** Issuer table after validation */
export type IssuerDatabaseSource = z.output<typeof issuerDatabaseSourceSchema>;

export type IssuerSource = z.output<typeof issuerSourceSchema>;
