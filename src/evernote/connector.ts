/**
 * Saves chat transcripts as Evernote notes.
 *
 * Resolves the target notebook by name (creating it when missing), converts
 * the transcript to ENML and submits it through a {@link NoteStore}.
 *
 * @module connector
 */

import { chatToEnml } from '../converter';
import type { Logger } from '../logger';
import { silentLogger } from '../logger';
import type { AccountUser, NoteDraft, NoteStore, Notebook } from './types';
import { EmptyChatError } from './types';

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

export interface ConnectorOptions {
  logger?: Logger;
  /** Clock used for default note titles. */
  now?: () => Date;
}

export interface SaveChatOptions {
  /** Chat transcript, Markdown flavoured. */
  chatContent: string;
  /** Note title; generated from the current time when omitted. */
  title?: string;
  /** Target notebook name; the account default when omitted. */
  notebookName?: string;
  tags?: string[];
}

export interface VerifyResult {
  user: AccountUser;
  notebookCount: number;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Default note title, e.g. `Claude Chat - 2024-03-05 14:07` (local time).
 */
export function defaultNoteTitle(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}`;
  return `Claude Chat - ${day} ${time}`;
}

// ---------------------------------------------------------------------------
// EvernoteConnector
// ---------------------------------------------------------------------------

export class EvernoteConnector {
  private readonly logger: Logger;
  private readonly now: () => Date;
  private notebooksCache: Notebook[] | null = null;

  constructor(
    private readonly store: NoteStore,
    options: ConnectorOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /** List all notebooks. Fetched once, then served from cache. */
  async listNotebooks(): Promise<Notebook[]> {
    if (this.notebooksCache === null) {
      this.logger.debug('Fetching notebooks from Evernote');
      this.notebooksCache = await this.store.listNotebooks();
    }
    return this.notebooksCache;
  }

  /**
   * Resolve a notebook name to its GUID, case-insensitively.
   *
   * Returns `undefined` for an empty name (meaning the account default).
   * A notebook that does not exist yet is created.
   */
  async getNotebookGuid(notebookName?: string): Promise<string | undefined> {
    if (!notebookName) {
      return undefined;
    }

    const wanted = notebookName.toLowerCase();
    const notebooks = await this.listNotebooks();
    const match = notebooks.find((notebook) => notebook.name.toLowerCase() === wanted);
    if (match) {
      this.logger.debug("Found notebook '%s' with GUID: %s", notebookName, match.guid);
      return match.guid;
    }

    this.logger.info("Notebook '%s' not found, creating it", notebookName);
    return this.createNotebook(notebookName);
  }

  /** Create a notebook and return its GUID. Invalidates the notebook cache. */
  async createNotebook(name: string): Promise<string> {
    const created = await this.store.createNotebook(name);
    this.notebooksCache = null;
    this.logger.info("Created notebook '%s' with GUID: %s", name, created.guid);
    return created.guid;
  }

  /**
   * Save a chat transcript as a new note.
   *
   * @returns GUID of the created note.
   * @throws {EmptyChatError} When the content is empty or whitespace-only.
   */
  async saveChat(options: SaveChatOptions): Promise<string> {
    const { chatContent, title, notebookName, tags } = options;
    if (!chatContent.trim()) {
      throw new EmptyChatError();
    }

    const draft: NoteDraft = {
      title: title || defaultNoteTitle(this.now()),
      content: chatToEnml(chatContent),
    };
    this.logger.debug('Creating note with title: %s', draft.title);

    const notebookGuid = await this.getNotebookGuid(notebookName);
    if (notebookGuid) draft.notebookGuid = notebookGuid;

    if (tags && tags.length > 0) {
      draft.tagNames = tags;
      this.logger.debug('Adding tags: %s', tags.join(', '));
    }

    try {
      const created = await this.store.createNote(draft);
      this.logger.info('Note created with GUID: %s', created.guid);
      return created.guid;
    } catch (error) {
      this.logger.error('Failed to create note: %s', error instanceof Error ? error.message : String(error));
      throw error;
    }
  }

  /** Check the token by fetching the account and its notebooks. */
  async verify(): Promise<VerifyResult> {
    const user = await this.store.getUser();
    const notebooks = await this.listNotebooks();
    this.logger.info('Connection verified for user: %s', user.username);
    return { user, notebookCount: notebooks.length };
  }
}
