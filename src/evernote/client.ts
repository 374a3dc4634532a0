/**
 * Note-store client backed by the official Evernote SDK.
 *
 * Adapts the SDK's Thrift-generated objects to the plain records of
 * {@link NoteStore} and maps every rejection through
 * {@link toEvernoteError}.
 */

import { Client, Types } from 'evernote';

import type { AccountUser, CreatedNote, NoteDraft, NoteStore, Notebook } from './types';
import { EvernoteError, toEvernoteError } from './types';

// ---------------------------------------------------------------------------
// Client configuration
// ---------------------------------------------------------------------------

/** Configuration used to construct an {@link EvernoteNoteStore}. */
export interface EvernoteNoteStoreOptions {
  /** Developer token from https://www.evernote.com/api/DeveloperToken.action */
  token: string;
  /** Talk to sandbox.evernote.com instead of production. */
  sandbox?: boolean;
}

// ---------------------------------------------------------------------------
// EvernoteNoteStore
// ---------------------------------------------------------------------------

/**
 * Authenticated note store for a single developer token.
 *
 * Usage:
 * ```ts
 * const store = new EvernoteNoteStore({ token: process.env.EVERNOTE_DEV_TOKEN ?? '' });
 * const notebooks = await store.listNotebooks();
 * ```
 */
export class EvernoteNoteStore implements NoteStore {
  private readonly client: Client;

  constructor(options: EvernoteNoteStoreOptions) {
    this.client = new Client({
      token: options.token,
      sandbox: options.sandbox ?? false,
    });
  }

  async listNotebooks(): Promise<Notebook[]> {
    const notebooks = await this.call('list notebooks', () =>
      this.client.getNoteStore().listNotebooks(),
    );
    return notebooks.map(toNotebook);
  }

  async createNotebook(name: string): Promise<Notebook> {
    const notebook = new Types.Notebook();
    notebook.name = name;
    const created = await this.call('create notebook', () =>
      this.client.getNoteStore().createNotebook(notebook),
    );
    return toNotebook(created);
  }

  async createNote(draft: NoteDraft): Promise<CreatedNote> {
    const note = new Types.Note();
    note.title = draft.title;
    note.content = draft.content;
    if (draft.notebookGuid) note.notebookGuid = draft.notebookGuid;
    if (draft.tagNames && draft.tagNames.length > 0) note.tagNames = draft.tagNames;

    const created = await this.call('create note', () =>
      this.client.getNoteStore().createNote(note),
    );
    return {
      guid: requireGuid(created.guid, 'note'),
      title: created.title ?? draft.title,
    };
  }

  async getUser(): Promise<AccountUser> {
    const user = await this.call('fetch user', () => this.client.getUserStore().getUser());
    return {
      username: user.username ?? '',
      email: user.email ?? '',
    };
  }

  // -----------------------------------------------------------------------
  // Private helpers
  // -----------------------------------------------------------------------

  private async call<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw toEvernoteError(error, action);
    }
  }
}

function toNotebook(notebook: Types.Notebook): Notebook {
  return {
    guid: requireGuid(notebook.guid, 'notebook'),
    name: notebook.name ?? '',
    defaultNotebook: notebook.defaultNotebook === true,
  };
}

function requireGuid(guid: string | null | undefined, what: string): string {
  if (!guid) {
    throw new EvernoteError(`Evernote returned a ${what} without a GUID`);
  }
  return guid;
}
