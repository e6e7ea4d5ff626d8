import { z } from 'zod';
import { API_VERSION, DEFAULT_BASE_URL, DOCUMENT_MIME_TYPE, REQUEST_TIMEOUT_MS } from '../constants.js';
import { MalformedResponseError, TransportError, causeMessage } from './errors.js';

export interface UploadOptions {
  apiKey: string;
  baseUrl?: string;
  displayName?: string;
  mimeType?: string;
}

export interface FileUploader {
  /** Resolves to the remote file URI. */
  upload(bytes: Uint8Array, displayName: string): Promise<string>;
}

const FinalizeResponseSchema = z.object({
  file: z.object({ uri: z.string().min(1) }),
});

export const getUploadUrl = (baseUrl: string, apiKey: string): string => {
  const cleanUrl = baseUrl.replace(/\/+$/, '');
  return `${cleanUrl}/upload/${API_VERSION}/files?key=${encodeURIComponent(apiKey)}`;
};

const post = async (url: string, init: { headers: Record<string, string>; body: string | Uint8Array }, step: string): Promise<Response> => {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: init.headers,
      body: init.body,
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
  } catch (error) {
    throw new TransportError(`Upload ${step} failed: ${causeMessage(error)}`, undefined, undefined, { cause: error });
  }
  if (!response.ok) {
    const errText = await response.text();
    throw new TransportError(`Upload ${step} failed with status ${response.status}`, response.status, errText);
  }
  return response;
};

/**
 * Two-step resumable upload: announce the file, then send every byte with
 * "upload, finalize". No retries; the caller decides when to try again.
 */
export const uploadDocument = async (bytes: Uint8Array, options: UploadOptions): Promise<string> => {
  const mimeType = options.mimeType ?? DOCUMENT_MIME_TYPE;
  const startResponse = await post(
    getUploadUrl(options.baseUrl ?? DEFAULT_BASE_URL, options.apiKey),
    {
      headers: {
        'X-Goog-Upload-Protocol': 'resumable',
        'X-Goog-Upload-Command': 'start',
        'X-Goog-Upload-Header-Content-Length': String(bytes.byteLength),
        'X-Goog-Upload-Header-Content-Type': mimeType,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({ file: { display_name: options.displayName ?? 'document' } }),
    },
    'start',
  );

  const sessionUrl = startResponse.headers.get('x-goog-upload-url');
  if (!sessionUrl) {
    throw new MalformedResponseError('Upload start response has no x-goog-upload-url header', await startResponse.text());
  }

  const finalizeResponse = await post(
    sessionUrl,
    {
      headers: {
        'X-Goog-Upload-Offset': '0',
        'X-Goog-Upload-Command': 'upload, finalize',
      },
      body: bytes,
    },
    'finalize',
  );

  const body = await finalizeResponse.text();
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new MalformedResponseError(`Upload finalize response is not JSON: ${causeMessage(error)}`, body, { cause: error });
  }
  const parsed = FinalizeResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new MalformedResponseError('Upload finalize response has no file.uri', body);
  }
  return parsed.data.file.uri;
};
