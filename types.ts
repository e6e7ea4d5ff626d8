import type { CompanionError } from './services/errors.js';

export type ContextStrategy = 'none' | 'page_images' | 'file_upload';

export interface AppSettings {
  model: string;
  maxOutputTokens: number;
  history: boolean;
  contextStrategy: ContextStrategy;
  systemPromptWithPdf: string;
  systemPromptWithoutPdf: string;
}

export type TurnRole = 'user' | 'model';

export interface Turn {
  role: TurnRole;
  text: string;
}

export interface ModelRequest {
  model: string;
  maxOutputTokens: number;
  systemPrompt: string;
  query: string;
  images?: readonly string[]; // base64 PNG, one per page
  fileUri?: string;
  history?: readonly Turn[];
}

export interface SessionContext {
  pageImages: string[] | null;
  fileUri: string | null;
  history: Turn[] | null;
}

export type SessionState = 'idle' | 'preparing-context' | 'awaiting-response';

export type SendOutcome =
  | { ok: true; query: string; answer: string }
  | { ok: false; query: string; error: CompanionError };

// Transcript of what the reader saw, independent of the history sent to the model
export interface Message {
  id: string;
  role: TurnRole;
  content: string;
  timestamp: number;
}

export interface ChatSession {
  id: string;
  title: string;
  pdfName: string;
  messages: Message[];
  lastUpdated: number;
}
