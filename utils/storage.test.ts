/**
 * Tests settings validation and transcript persistence.
 */

import assert from 'node:assert';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import test from 'node:test';
import { ConfigurationError } from '../services/errors.js';
import type { ChatSession } from '../types.js';
import { loadSettings, parseSettings, saveTranscript } from './storage.js';

const withTempDir = async (run: (dir: string) => Promise<void>) => {
  const dir = await mkdtemp(path.join(tmpdir(), 'reader-companion-'));
  try {
    await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
};

const validFile = {
  model: 'gemini-2.5-flash',
  max_output_tokens: 2048,
  history: true,
  pdf_context: 'file_upload',
  system_prompt_with_pdf: 'Use the attached paper.',
  system_prompt_without_pdf: 'Answer from general knowledge.',
  font_size: 14,
};

test('parseSettings maps the file keys onto settings', () => {
  assert.deepStrictEqual(parseSettings(validFile), {
    model: 'gemini-2.5-flash',
    maxOutputTokens: 2048,
    history: true,
    contextStrategy: 'file_upload',
    systemPromptWithPdf: 'Use the attached paper.',
    systemPromptWithoutPdf: 'Answer from general knowledge.',
  });
});

test('parseSettings accepts the older whole_pdf flag', () => {
  const settings = parseSettings({
    model: 'gemini-2.5-flash',
    max_output_tokens: 100,
    history: false,
    whole_pdf: true,
    system_prompt_whole_pdf: 'pages attached',
    system_prompt_no_whole_pdf: 'no pages',
  });

  assert.strictEqual(settings.contextStrategy, 'page_images');
  assert.strictEqual(settings.systemPromptWithPdf, 'pages attached');
  assert.strictEqual(settings.systemPromptWithoutPdf, 'no pages');
});

test('parseSettings defaults to no context', () => {
  const { pdf_context: _omitted, ...withoutStrategy } = validFile;

  assert.strictEqual(parseSettings(withoutStrategy).contextStrategy, 'none');
});

test('parseSettings lists every invalid field', () => {
  assert.throws(
    () => parseSettings({ ...validFile, max_output_tokens: 0, pdf_context: 'everything' }),
    (error: unknown) =>
      error instanceof ConfigurationError &&
      error.message.startsWith('Invalid settings: ') &&
      error.message.includes('max_output_tokens: ') &&
      error.message.includes('pdf_context: '),
  );
});

test('parseSettings requires both system prompts', () => {
  const { system_prompt_without_pdf: _omitted, ...withoutPrompt } = validFile;

  assert.throws(
    () => parseSettings(withoutPrompt),
    (error: unknown) =>
      error instanceof ConfigurationError && error.message === 'Invalid settings: system_prompt_without_pdf: Required',
  );
});

test('loadSettings rereads the file on every call', async () => {
  await withTempDir(async dir => {
    const file = path.join(dir, 'settings.json');
    await writeFile(file, JSON.stringify(validFile));
    assert.strictEqual((await loadSettings(file)).history, true);

    await writeFile(file, JSON.stringify({ ...validFile, history: false }));
    assert.strictEqual((await loadSettings(file)).history, false);
  });
});

test('loadSettings reports unreadable and invalid files', async () => {
  await withTempDir(async dir => {
    const missing = path.join(dir, 'missing.json');
    await assert.rejects(
      loadSettings(missing),
      (error: unknown) => error instanceof ConfigurationError && error.message.startsWith(`Cannot read settings file ${missing}`),
    );

    const broken = path.join(dir, 'broken.json');
    await writeFile(broken, '{ "model": ');
    await assert.rejects(
      loadSettings(broken),
      (error: unknown) => error instanceof ConfigurationError && error.message.startsWith(`Settings file ${broken} is not valid JSON`),
    );
  });
});

test('saveTranscript writes the session as formatted JSON', async () => {
  await withTempDir(async dir => {
    const file = path.join(dir, 'nested', 'transcript.json');
    const session: ChatSession = {
      id: 'session-1',
      title: 'paper.pdf',
      pdfName: 'paper.pdf',
      messages: [{ id: 'm1', role: 'user', content: 'hello', timestamp: 1 }],
      lastUpdated: 1,
    };

    await saveTranscript(file, session);

    const text = await readFile(file, 'utf8');
    assert.strictEqual(text, JSON.stringify(session, null, 2));
  });
});
