import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { ConfigurationError, causeMessage } from '../services/errors.js';
import type { AppSettings, ChatSession, ContextStrategy } from '../types.js';

const ContextStrategySchema = z.enum(['none', 'page_images', 'file_upload']);

// Unknown keys (font_size and other viewer options) are stripped.
const SettingsFileSchema = z
  .object({
    model: z.string().min(1),
    max_output_tokens: z.number().int().positive(),
    history: z.boolean(),
    pdf_context: ContextStrategySchema.optional(),
    system_prompt_with_pdf: z.string().optional(),
    system_prompt_without_pdf: z.string().optional(),
    // Older settings files toggled page images with a single flag.
    whole_pdf: z.boolean().optional(),
    system_prompt_whole_pdf: z.string().optional(),
    system_prompt_no_whole_pdf: z.string().optional(),
  })
  .transform((raw, ctx): AppSettings => {
    const contextStrategy: ContextStrategy = raw.pdf_context ?? (raw.whole_pdf ? 'page_images' : 'none');
    const systemPromptWithPdf = raw.system_prompt_with_pdf ?? raw.system_prompt_whole_pdf;
    const systemPromptWithoutPdf = raw.system_prompt_without_pdf ?? raw.system_prompt_no_whole_pdf;
    if (systemPromptWithPdf === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['system_prompt_with_pdf'], message: 'Required' });
    }
    if (systemPromptWithoutPdf === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['system_prompt_without_pdf'], message: 'Required' });
    }
    return {
      model: raw.model,
      maxOutputTokens: raw.max_output_tokens,
      history: raw.history,
      contextStrategy,
      systemPromptWithPdf: systemPromptWithPdf ?? '',
      systemPromptWithoutPdf: systemPromptWithoutPdf ?? '',
    };
  });

export const parseSettings = (json: unknown, source = 'settings'): AppSettings => {
  const parsed = SettingsFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid ${source}: ${issues}`);
  }
  return parsed.data;
};

/** Read on every send so edits to the file apply to the next request. */
export const loadSettings = async (path: string): Promise<AppSettings> => {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read settings file ${path}: ${causeMessage(error)}`, { cause: error });
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Settings file ${path} is not valid JSON: ${causeMessage(error)}`, { cause: error });
  }
  return parseSettings(json, `settings file ${path}`);
};

export const saveTranscript = async (path: string, session: ChatSession): Promise<void> => {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(session, null, 2), 'utf8');
};
