import { basename } from 'node:path';
import type { AppSettings, SendOutcome, SessionContext, SessionState, Turn } from '../types.js';
import { loadSettings as loadSettingsFile } from '../utils/storage.js';
import { CompanionError, SessionBusyError, toCompanionError } from './errors.js';
import type { FileUploader } from './fileUploadService.js';
import { ModelClient, selectSystemPrompt } from './geminiService.js';
import type { ContextExtractor } from './pdfContextService.js';

export interface CompanionSessionOptions {
  documentPath: string;
  settingsPath: string;
  client: ModelClient;
  uploader: FileUploader;
  extractor: ContextExtractor;
  loadSettings?: (path: string) => Promise<AppSettings>;
}

export interface SendCallbacks {
  onSuccess?: (answer: string, query: string) => void;
  onError?: (error: CompanionError, query: string) => void;
}

interface PreparedContext {
  images?: string[];
  fileUri?: string;
}

/**
 * Owns the per-document caches and the conversation history for one reading
 * session. One send may be in flight at a time; a second submit while busy
 * resolves with SessionBusyError and leaves everything untouched.
 */
export class CompanionSession {
  private readonly options: CompanionSessionOptions;
  private readonly context: SessionContext = { pageImages: null, fileUri: null, history: null };
  private currentState: SessionState = 'idle';

  constructor(options: CompanionSessionOptions) {
    this.options = options;
  }

  get state(): SessionState {
    return this.currentState;
  }

  get history(): readonly Turn[] | null {
    return this.context.history ? [...this.context.history] : null;
  }

  get cachedPageCount(): number {
    return this.context.pageImages?.length ?? 0;
  }

  get fileUri(): string | null {
    return this.context.fileUri;
  }

  async submit(query: string, callbacks: SendCallbacks = {}): Promise<SendOutcome> {
    const outcome = await this.run(query);
    if (outcome.ok) {
      callbacks.onSuccess?.(outcome.answer, outcome.query);
    } else {
      callbacks.onError?.(outcome.error, outcome.query);
    }
    return outcome;
  }

  private async run(query: string): Promise<SendOutcome> {
    if (this.currentState !== 'idle') {
      return { ok: false, query, error: new SessionBusyError() };
    }
    this.currentState = 'preparing-context';

    try {
      const settings = await (this.options.loadSettings ?? loadSettingsFile)(this.options.settingsPath);
      this.applySettings(settings);

      const prepared = await this.prepareContext(settings);
      const history = this.context.history ? [...this.context.history] : undefined;

      this.currentState = 'awaiting-response';
      const answer = await this.options.client.send({
        model: settings.model,
        maxOutputTokens: settings.maxOutputTokens,
        systemPrompt: selectSystemPrompt(settings, (prepared.images?.length ?? 0) > 0 || prepared.fileUri !== undefined),
        query,
        images: prepared.images,
        fileUri: prepared.fileUri,
        history,
      });

      this.context.history?.push({ role: 'user', text: query }, { role: 'model', text: answer });
      return { ok: true, query, answer };
    } catch (error) {
      const companionError = toCompanionError(error);
      console.error(`Request failed: ${companionError.message}`);
      return { ok: false, query, error: companionError };
    } finally {
      this.currentState = 'idle';
    }
  }

  // Drops context that belongs to another strategy and toggles history.
  private applySettings(settings: AppSettings): void {
    if (settings.contextStrategy !== 'page_images') {
      this.context.pageImages = null;
    }
    if (settings.contextStrategy !== 'file_upload') {
      this.context.fileUri = null;
    }
    if (settings.history) {
      this.context.history ??= [];
    } else {
      this.context.history = null;
    }
  }

  private async prepareContext(settings: AppSettings): Promise<PreparedContext> {
    const { documentPath, extractor, uploader } = this.options;

    switch (settings.contextStrategy) {
      case 'page_images': {
        if (!this.context.pageImages) {
          console.info('Rendering PDF pages once');
          const images = await extractor.renderPageImages(documentPath);
          const totalBytes = images.reduce((sum, image) => sum + image.length, 0);
          console.info(`Rendered ${images.length} pages, ${totalBytes} bytes of base64`);
          this.context.pageImages = images;
        }
        return { images: this.context.pageImages };
      }
      case 'file_upload': {
        if (!this.context.fileUri) {
          console.info('Uploading PDF once');
          const bytes = await extractor.readDocumentBytes(documentPath);
          this.context.fileUri = await uploader.upload(bytes, basename(documentPath));
          console.info(`Uploaded ${bytes.byteLength} bytes as ${this.context.fileUri}`);
        }
        return { fileUri: this.context.fileUri };
      }
      case 'none':
        return {};
    }
  }
}
