/**
 * chat-to-evernote - save Markdown chat transcripts as Evernote notes
 */

// Conversion
export { chatToEnml, ENML_HEADER, ENML_FOOTER } from './converter';

// Core module re-exports
export {
  classifyLine,
  renderLine,
  segmentChat,
  splitLines,
  formatInline,
  escapeHtml,
  ENML_STYLES,
} from './core/index';

export type { ChatLine, ChatLineKind, HeadingLevel, SpeakerRole } from './core/index';

// Evernote
export { EvernoteConnector } from './evernote/connector';
export type { ConnectorOptions, SaveChatOptions, VerifyResult } from './evernote/connector';
export { EvernoteNoteStore } from './evernote/client';
export type { EvernoteNoteStoreOptions } from './evernote/client';
export {
  EvernoteError,
  EvernoteRateLimitError,
  EvernoteConnectionError,
  EmptyChatError,
} from './evernote/types';
export type { AccountUser, CreatedNote, NoteDraft, NoteStore, Notebook } from './evernote/types';

// Ambient
export { loadConfig } from './config';
export type { AppConfig, LoadConfigOptions } from './config';
export { createLogger, silentLogger } from './logger';
export type { Logger, LogLevel } from './logger';
