/**
 * Zod schemas for the persisted ledger document
 *
 * Documents written by earlier versions of the tool used `activity` for the
 * description, `brainstorms` for the note list and a single `thoughts` string
 * per note; those are accepted and normalized on load. Records stored without
 * an id get one derived from their content.
 */

import { z } from 'zod';
import { createHash } from 'crypto';
import type { LedgerDocument } from '../../types/index.js';

/**
 * Id for a stored record that was written without one. Derived from the
 * record's position and content so every load of the same document yields
 * the same id.
 */
export function derivedId(kind: 'entry' | 'note', index: number, record: unknown): string {
  const digest = createHash('sha256').update(JSON.stringify([kind, index, record])).digest('hex');
  return `${kind}-${digest.slice(0, 16)}`;
}

const timestampSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid ISO 8601 timestamp' });

const entrySchema = z
  .object({
    id: z.string().min(1).optional(),
    timestamp: timestampSchema,
    description: z.string().optional(),
    activity: z.string().optional(),
    // Older documents stored numeric strings
    duration_minutes: z
      .union([z.number(), z.string().regex(/^\d+(\.\d+)?$/, 'Expected a number').transform(Number)])
      .pipe(z.number().finite().nonnegative()),
    note: z.string().nullish(),
  })
  .refine((entry) => entry.description !== undefined || entry.activity !== undefined, {
    message: 'Entry needs a description',
    path: ['description'],
  })
  .transform((entry) => ({
    id: entry.id,
    timestamp: entry.timestamp,
    description: entry.description ?? entry.activity ?? '',
    duration_minutes: entry.duration_minutes,
    note: entry.note ?? '',
  }));

const brainstormSchema = z
  .object({
    id: z.string().min(1).optional(),
    timestamp: timestampSchema,
    topic: z.string(),
    ideas: z.array(z.string()).optional(),
    thoughts: z.string().optional(),
  })
  .transform((note) => ({
    id: note.id,
    timestamp: note.timestamp,
    topic: note.topic,
    ideas: note.ideas ?? (note.thoughts !== undefined ? [note.thoughts] : []),
  }));

export const ledgerDocumentSchema = z
  .object({
    entries: z.array(entrySchema).default([]),
    brainstorm: z.array(brainstormSchema).optional(),
    brainstorms: z.array(brainstormSchema).optional(),
  })
  .transform(
    (doc): LedgerDocument => ({
      entries: doc.entries.map((entry, index) => ({ ...entry, id: entry.id ?? derivedId('entry', index, entry) })),
      brainstorm: [...(doc.brainstorm ?? []), ...(doc.brainstorms ?? [])].map((note, index) => ({
        ...note,
        id: note.id ?? derivedId('note', index, note),
      })),
    })
  );

/**
 * Validate raw parsed JSON as a ledger document
 */
export function parseLedgerDocument(raw: unknown) {
  return ledgerDocumentSchema.safeParse(raw);
}

export function emptyDocument(): LedgerDocument {
  return { entries: [], brainstorm: [] };
}
