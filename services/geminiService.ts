import {
  Content,
  GenerationConfig,
  Part,
  createModelContent,
  createPartFromBase64,
  createPartFromText,
  createPartFromUri,
  createUserContent,
} from '@google/genai';
import { z } from 'zod';
import {
  API_KEY_ENV,
  API_VERSION,
  BASE_URL_ENV,
  DEFAULT_BASE_URL,
  DOCUMENT_MIME_TYPE,
  PAGE_IMAGE_MIME_TYPE,
  REQUEST_TIMEOUT_MS,
} from '../constants.js';
import type { AppSettings, ModelRequest } from '../types.js';
import { MalformedResponseError, MissingCredentialError, TransportError, causeMessage } from './errors.js';
import { FileUploader, uploadDocument } from './fileUploadService.js';

export interface ModelClient {
  /** Resolves to the answer text of the first candidate. */
  send(request: ModelRequest): Promise<string>;
}

export interface GenerateContentBody {
  contents: Content[];
  systemInstruction: Content;
  generationConfig: GenerationConfig;
}

export interface GeminiClientOptions {
  apiKey?: string;
  baseUrl?: string;
  env?: Record<string, string | undefined>;
}

const GenerateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string().optional() })).min(1),
        }),
      }),
    )
    .min(1),
});

export const selectSystemPrompt = (settings: AppSettings, hasPdfContext: boolean): string =>
  hasPdfContext ? settings.systemPromptWithPdf : settings.systemPromptWithoutPdf;

export const buildRequestBody = (request: ModelRequest): GenerateContentBody => {
  const contents: Content[] = (request.history ?? []).map(turn =>
    turn.role === 'model' ? createModelContent(createPartFromText(turn.text)) : createUserContent(createPartFromText(turn.text)),
  );

  const parts: Part[] = [];
  if (request.images && request.images.length > 0) {
    request.images.forEach(image => parts.push(createPartFromBase64(image, PAGE_IMAGE_MIME_TYPE)));
  } else if (request.fileUri) {
    parts.push(createPartFromUri(request.fileUri, DOCUMENT_MIME_TYPE));
  }
  parts.push(createPartFromText(request.query));
  contents.push(createUserContent(parts));

  return {
    contents,
    systemInstruction: { parts: [createPartFromText(request.systemPrompt)] },
    generationConfig: { maxOutputTokens: request.maxOutputTokens },
  };
};

export const parseAnswer = (body: string): string => {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new MalformedResponseError(`Response is not JSON: ${causeMessage(error)}`, body, { cause: error });
  }
  const parsed = GenerateContentResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new MalformedResponseError('Response has no candidates[0].content.parts', body);
  }
  const text = parsed.data.candidates[0].content.parts[0].text;
  if (text === undefined) {
    throw new MalformedResponseError('Response has no candidates[0].content.parts[0].text', body);
  }
  return text;
};

export class GeminiClient implements ModelClient, FileUploader {
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(options: GeminiClientOptions = {}) {
    const env = options.env ?? process.env;
    const apiKey = options.apiKey ?? env[API_KEY_ENV];
    if (!apiKey) {
      throw new MissingCredentialError(API_KEY_ENV);
    }
    this.apiKey = apiKey;
    this.baseUrl = (options.baseUrl ?? env[BASE_URL_ENV] ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
  }

  getGenerateUrl(model: string): string {
    const modelId = model.replace(/^models\//, '');
    return `${this.baseUrl}/${API_VERSION}/models/${encodeURIComponent(modelId)}:generateContent?key=${encodeURIComponent(this.apiKey)}`;
  }

  async send(request: ModelRequest): Promise<string> {
    let response: Response;
    try {
      response = await fetch(this.getGenerateUrl(request.model), {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(buildRequestBody(request)),
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
    } catch (error) {
      throw new TransportError(`Gemini request failed: ${causeMessage(error)}`, undefined, undefined, { cause: error });
    }

    if (!response.ok) {
      const errText = await response.text();
      throw new TransportError(`Gemini API Error (${response.status})`, response.status, errText);
    }

    return parseAnswer(await response.text());
  }

  async upload(bytes: Uint8Array, displayName: string): Promise<string> {
    return uploadDocument(bytes, { apiKey: this.apiKey, baseUrl: this.baseUrl, displayName });
  }
}
