import type { ContextStrategy } from './types.js';

export const API_KEY_ENV = 'GEMINI_API_KEY';
export const BASE_URL_ENV = 'GEMINI_BASE_URL';

export const DEFAULT_BASE_URL = 'https://generativelanguage.googleapis.com';
export const API_VERSION = 'v1beta';

// Bounds the model and upload calls; page rendering has no limit.
export const REQUEST_TIMEOUT_MS = 120_000;

export const PAGE_IMAGE_MIME_TYPE = 'image/png';
export const DOCUMENT_MIME_TYPE = 'application/pdf';

export const CONTEXT_STRATEGIES: readonly ContextStrategy[] = ['none', 'page_images', 'file_upload'];

export const WAITING_TEXT = 'Waiting ...';
