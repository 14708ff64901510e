/**
 * Entry store: the append-only ledger of time entries and brainstorm notes
 *
 * BaseLedgerStore keeps the in-memory state and answers queries; subclasses
 * decide where the document lives. FileLedgerStore persists to JSON with an
 * atomic replace, MemoryLedgerStore keeps a copy in memory for tests.
 */

import { readFile } from 'fs/promises';
import { randomUUID } from 'crypto';
import { logger } from '../../utils/logger.js';
import { StorageError, errorMessage } from '../../utils/errors.js';
import { writeFileAtomic } from './files.js';
import { parseLedgerDocument, emptyDocument } from './schema.js';
import type {
  BrainstormNote,
  LedgerDocument,
  NewTimeEntry,
  TimeEntry,
} from '../../types/index.js';

export interface LedgerStore {
  /** Read the persisted document; a missing document yields an empty store */
  load(): Promise<void>;
  /** Add one entry and return it with its assigned id */
  append(entry: NewTimeEntry): TimeEntry;
  /** Record a brainstorm note group */
  appendBrainstorm(topic: string, ideas: string[], timestamp: string): BrainstormNote;
  /** Remove an entry by id; returns false when no such entry exists */
  remove(id: string): boolean;
  /** Entries with start <= timestamp <= end, oldest first */
  query(start: Date, end: Date): TimeEntry[];
  /** All entries in insertion order */
  all(): TimeEntry[];
  brainstorms(): BrainstormNote[];
  snapshot(): LedgerDocument;
  /** Whether in-memory state differs from what was loaded or last flushed */
  readonly dirty: boolean;
  /** Persist the in-memory state */
  flush(): Promise<void>;
}

function copyEntry(entry: TimeEntry): TimeEntry {
  return { ...entry };
}

function copyNote(note: BrainstormNote): BrainstormNote {
  return { ...note, ideas: [...note.ideas] };
}

/**
 * Copies of entries ordered by timestamp; equal timestamps keep input order
 */
export function sortChronologically(entries: readonly TimeEntry[]): TimeEntry[] {
  return entries
    .map((entry, index) => ({ entry, index, time: Date.parse(entry.timestamp) }))
    .sort((a, b) => a.time - b.time || a.index - b.index)
    .map(({ entry }) => copyEntry(entry));
}

export abstract class BaseLedgerStore implements LedgerStore {
  protected entries: TimeEntry[] = [];
  protected notes: BrainstormNote[] = [];
  private mutated = false;

  abstract load(): Promise<void>;
  protected abstract persist(document: LedgerDocument): Promise<void>;

  get dirty(): boolean {
    return this.mutated;
  }

  protected replaceState(document: LedgerDocument): void {
    this.entries = document.entries.map(copyEntry);
    this.notes = document.brainstorm.map(copyNote);
    this.mutated = false;
  }

  append(entry: NewTimeEntry): TimeEntry {
    if (!(entry.duration_minutes >= 0) || !Number.isFinite(entry.duration_minutes)) {
      throw new RangeError(`duration_minutes must be a non-negative number, got ${entry.duration_minutes}`);
    }
    if (Number.isNaN(Date.parse(entry.timestamp))) {
      throw new RangeError(`Invalid entry timestamp: ${entry.timestamp}`);
    }

    const stored: TimeEntry = { id: randomUUID(), ...entry };
    this.entries.push(stored);
    this.mutated = true;
    return copyEntry(stored);
  }

  appendBrainstorm(topic: string, ideas: string[], timestamp: string): BrainstormNote {
    const note: BrainstormNote = { id: randomUUID(), timestamp, topic, ideas: [...ideas] };
    this.notes.push(note);
    this.mutated = true;
    return copyNote(note);
  }

  remove(id: string): boolean {
    const index = this.entries.findIndex((entry) => entry.id === id);
    if (index === -1) return false;
    this.entries.splice(index, 1);
    this.mutated = true;
    return true;
  }

  query(start: Date, end: Date): TimeEntry[] {
    const from = start.getTime();
    const to = end.getTime();

    return sortChronologically(
      this.entries.filter((entry) => {
        const time = Date.parse(entry.timestamp);
        return time >= from && time <= to;
      })
    );
  }

  all(): TimeEntry[] {
    return this.entries.map(copyEntry);
  }

  brainstorms(): BrainstormNote[] {
    return this.notes.map(copyNote);
  }

  snapshot(): LedgerDocument {
    return { entries: this.all(), brainstorm: this.brainstorms() };
  }

  async flush(): Promise<void> {
    await this.persist(this.snapshot());
    this.mutated = false;
  }
}

/**
 * Parse document text, reporting the file it came from on failure
 */
export function decodeLedger(content: string, source: string): LedgerDocument {
  if (!content.trim()) {
    return emptyDocument();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new StorageError(`Corrupt ledger ${source}: ${errorMessage(error)}`, source, { cause: error });
  }

  const result = parseLedgerDocument(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new StorageError(`Invalid ledger ${source}: ${issues}`, source, { cause: result.error });
  }
  return result.data;
}

export function encodeLedger(document: LedgerDocument): string {
  return `${JSON.stringify(document, null, 2)}\n`;
}

export class FileLedgerStore extends BaseLedgerStore {
  constructor(readonly path: string) {
    super();
  }

  async load(): Promise<void> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        logger.debug(`No ledger at ${this.path}, starting empty`);
        this.replaceState(emptyDocument());
        return;
      }
      throw new StorageError(`Cannot read ledger ${this.path}: ${errorMessage(error)}`, this.path, {
        cause: error,
      });
    }

    const document = decodeLedger(content, this.path);
    this.replaceState(document);
    logger.debug(`Loaded ${document.entries.length} entries from ${this.path}`);
  }

  protected async persist(document: LedgerDocument): Promise<void> {
    await writeFileAtomic(this.path, encodeLedger(document));
    logger.debug(`Flushed ${document.entries.length} entries to ${this.path}`);
  }
}

export class MemoryLedgerStore extends BaseLedgerStore {
  private persisted: LedgerDocument;

  constructor(initial: Partial<LedgerDocument> = {}) {
    super();
    this.persisted = {
      entries: (initial.entries ?? []).map(copyEntry),
      brainstorm: (initial.brainstorm ?? []).map(copyNote),
    };
  }

  async load(): Promise<void> {
    this.replaceState(this.persisted);
  }

  protected async persist(document: LedgerDocument): Promise<void> {
    this.persisted = document;
  }

  /** The document as last flushed */
  persistedDocument(): LedgerDocument {
    return {
      entries: this.persisted.entries.map(copyEntry),
      brainstorm: this.persisted.brainstorm.map(copyNote),
    };
  }
}
