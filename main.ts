import { access } from 'node:fs/promises';
import { CliOptions, ReaderCompanionApp, TranscriptRecorder, USAGE, buildViewerUrl, parseCliArgs } from './app.js';
import { CompanionSession } from './services/companionSession.js';
import { ConfigurationError, DocumentAccessError, MissingCredentialError } from './services/errors.js';
import { GeminiClient } from './services/geminiService.js';
import { pdfContextService } from './services/pdfContextService.js';
import { renderMarkdown } from './utils/markdown.js';
import { loadSettings } from './utils/storage.js';

/** Runs the companion and resolves with the process exit code. */
export const main = async (
  argv: string[],
  env: Record<string, string | undefined> = process.env,
): Promise<number> => {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`${error.message}\n\n${USAGE}`);
      return 2;
    }
    throw error;
  }
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  let client: GeminiClient;
  try {
    client = new GeminiClient({ env });
  } catch (error) {
    if (error instanceof MissingCredentialError) {
      console.error(`FATAL: ${error.message}. Export your Gemini API key before starting.`);
      return 1;
    }
    throw error;
  }

  try {
    await access(options.file);
    await loadSettings(options.settings);
  } catch (error) {
    const fatal = error instanceof ConfigurationError ? error : new DocumentAccessError(options.file, error);
    console.error(`FATAL: ${fatal.message}`);
    return 1;
  }

  const session = new CompanionSession({
    documentPath: options.file,
    settingsPath: options.settings,
    client,
    uploader: client,
    extractor: pdfContextService,
  });
  const app = new ReaderCompanionApp(session, process.stdout, {
    transcript: options.transcript ? new TranscriptRecorder(options.transcript, options.file) : undefined,
    renderAnswer: process.stdout.isTTY ? renderMarkdown : undefined,
  });

  if (options.pdfViewer) {
    console.log(`Open in the viewer: ${buildViewerUrl(options.pdfViewer, options.file)}`);
  }

  if (options.query !== undefined) {
    const outcome = await app.ask(options.query);
    return outcome.ok ? 0 : 1;
  }

  console.log('Select text in the viewer, paste it here and type /send on its own line to ask. /quit exits.');
  await app.run(process.stdin);
  return 0;
};
