/**
 * Tests startup exit codes before any session exists.
 */

import assert from 'node:assert';
import test from 'node:test';
import { main } from './main.js';

test('main exits with 1 when the API key is not set', async t => {
  const errors = t.mock.method(console, 'error', () => {});

  const code = await main(['--file', 'paper.pdf', '--settings', 'settings.json'], {});

  assert.strictEqual(code, 1);
  assert.strictEqual(errors.mock.callCount(), 1);
  assert.strictEqual(
    errors.mock.calls[0].arguments[0],
    'FATAL: Environment variable GEMINI_API_KEY is not set. Export your Gemini API key before starting.',
  );
});

test('main exits with 1 when an empty API key is set', async t => {
  t.mock.method(console, 'error', () => {});

  assert.strictEqual(await main(['--file', 'paper.pdf', '--settings', 'settings.json'], { GEMINI_API_KEY: '' }), 1);
});

test('main exits with 1 when the document is missing', async t => {
  const errors = t.mock.method(console, 'error', () => {});

  const code = await main(['--file', '/nonexistent/paper.pdf', '--settings', 'settings.json'], {
    GEMINI_API_KEY: 'test-secret',
  });

  assert.strictEqual(code, 1);
  assert.strictEqual(errors.mock.callCount(), 1);
});

test('main exits with 2 on missing options and 0 on --help', async t => {
  t.mock.method(console, 'error', () => {});
  t.mock.method(console, 'log', () => {});

  assert.strictEqual(await main(['--settings', 'settings.json'], {}), 2);
  assert.strictEqual(await main(['--help'], {}), 0);
});
