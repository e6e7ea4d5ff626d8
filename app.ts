import { basename, resolve } from 'node:path';
import { createInterface } from 'node:readline';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import { v4 as uuidv4 } from 'uuid';
import { CONTEXT_STRATEGIES, WAITING_TEXT } from './constants.js';
import type { CompanionSession } from './services/companionSession.js';
import { ConfigurationError, causeMessage, describeError } from './services/errors.js';
import type { ChatSession, SendOutcome } from './types.js';
import { saveTranscript } from './utils/storage.js';

export const QUIT_COMMAND = '/quit';
export const SEND_COMMAND = '/send';

export const USAGE = `Usage: reader-companion --file <document.pdf> --settings <settings.json> [options]

Options:
  --pdf-viewer <viewer.html>  print the viewer URL that opens the document
  --transcript <file.json>    save every question and answer to this file
  --query <text>              ask once, print the answer and exit
  --help                      show this message

Without --query, paste a passage and type /send on its own line to ask; /quit exits.
Settings "pdf_context" is one of: ${CONTEXT_STRATEGIES.join(', ')}.
The API key is read from GEMINI_API_KEY.`;

export interface CliOptions {
  file: string;
  settings: string;
  pdfViewer?: string;
  transcript?: string;
  query?: string;
  help: boolean;
}

export interface TextOutput {
  write(text: string): unknown;
}

export interface AppOptions {
  transcript?: TranscriptRecorder;
  /** Formats an answer before it is printed; the transcript keeps the raw text. */
  renderAnswer?: (answer: string) => string;
}

const readFlags = (argv: string[]) =>
  parseArgs({
    args: argv,
    options: {
      file: { type: 'string' },
      settings: { type: 'string' },
      'pdf-viewer': { type: 'string' },
      transcript: { type: 'string' },
      query: { type: 'string' },
      help: { type: 'boolean', default: false },
    },
    strict: true,
    allowPositionals: false,
  });

export const parseCliArgs = (argv: string[]): CliOptions => {
  let values: ReturnType<typeof readFlags>['values'];
  try {
    values = readFlags(argv).values;
  } catch (error) {
    throw new ConfigurationError(causeMessage(error), { cause: error });
  }

  const help = values.help ?? false;
  if (help) {
    return { file: values.file ?? '', settings: values.settings ?? '', help };
  }
  if (!values.file) throw new ConfigurationError('Missing required option --file');
  if (!values.settings) throw new ConfigurationError('Missing required option --settings');

  return {
    file: values.file,
    settings: values.settings,
    pdfViewer: values['pdf-viewer'],
    transcript: values.transcript,
    query: values.query,
    help,
  };
};

/** URL of a pdf.js style viewer page with the document passed as ?file=. */
export const buildViewerUrl = (viewerPath: string, documentPath: string): string => {
  const viewerUrl = pathToFileURL(resolve(viewerPath)).href;
  const documentUrl = pathToFileURL(resolve(documentPath)).href;
  return `${viewerUrl}?file=${encodeURIComponent(documentUrl)}`;
};

/**
 * Collects pasted lines, blank ones included, until a /send line. Pasted
 * selections often span paragraphs, so a blank line cannot end a passage.
 */
export class InputBuffer {
  private lines: string[] = [];

  push(line: string): string | null {
    if (line.trim() === SEND_COMMAND) {
      return this.flush();
    }
    this.lines.push(line);
    return null;
  }

  flush(): string | null {
    const passage = this.lines.join('\n').trim();
    this.lines = [];
    return passage === '' ? null : passage;
  }
}

export class TranscriptRecorder {
  readonly session: ChatSession;

  constructor(private readonly path: string, documentPath: string) {
    const pdfName = basename(documentPath);
    this.session = { id: uuidv4(), title: pdfName, pdfName, messages: [], lastUpdated: Date.now() };
  }

  async record(query: string, answer: string): Promise<void> {
    const timestamp = Date.now();
    this.session.messages.push(
      { id: uuidv4(), role: 'user', content: query, timestamp },
      { id: uuidv4(), role: 'model', content: answer, timestamp },
    );
    this.session.lastUpdated = timestamp;
    await saveTranscript(this.path, this.session);
  }
}

export class ReaderCompanionApp {
  private readonly buffer = new InputBuffer();

  constructor(
    private readonly session: CompanionSession,
    private readonly output: TextOutput,
    private readonly options: AppOptions = {},
  ) {}

  async ask(query: string): Promise<SendOutcome> {
    this.output.write(`${WAITING_TEXT}\n`);
    const outcome = await this.session.submit(query, {
      onSuccess: answer => this.output.write(`${this.options.renderAnswer?.(answer) ?? answer}\n`),
      onError: error => this.output.write(`${describeError(error)}\n`),
    });
    const { transcript } = this.options;
    if (outcome.ok && transcript) {
      try {
        await transcript.record(outcome.query, outcome.answer);
      } catch (error) {
        console.warn(`Failed to save transcript: ${causeMessage(error)}`);
      }
    }
    return outcome;
  }

  /** Reads passages until /quit or end of input, then waits for pending answers. */
  run(input: NodeJS.ReadableStream): Promise<void> {
    const rl = createInterface({ input, crlfDelay: Infinity, terminal: false });
    const pending = new Set<Promise<SendOutcome>>();
    let quitting = false;

    const dispatch = (passage: string | null) => {
      if (passage === null) return;
      const task: Promise<SendOutcome> = this.ask(passage).finally(() => pending.delete(task));
      pending.add(task);
    };

    return new Promise((resolvePromise, rejectPromise) => {
      rl.on('line', line => {
        if (quitting) return;
        if (line.trim() === QUIT_COMMAND) {
          quitting = true;
          rl.close();
          return;
        }
        dispatch(this.buffer.push(line));
      });
      rl.on('close', () => {
        if (!quitting) dispatch(this.buffer.flush());
        Promise.all(pending).then(() => resolvePromise(), rejectPromise);
      });
    });
  }
}
