import fs from 'node:fs';
import path from 'node:path';
import type { z } from 'zod';
import { PipelineError } from '@main/services/errors/PipelineError';

export function formatZodIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Le um JSON validado por schema. Arquivo ausente grava e retorna os defaults;
 * arquivo invalido e erro (nunca e sobrescrito em silencio).
 */
export function loadJsonConfig<T extends z.ZodTypeAny>(filePath: string, schema: T, defaults: z.input<T>): z.output<T> {
  if (!fs.existsSync(filePath)) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, `${JSON.stringify(defaults, null, 2)}\n`, 'utf-8');
    return parseOrThrow(filePath, schema, defaults);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new PipelineError('config_invalid', `Configuracao ilegivel em ${filePath}`, { cause: error });
  }

  return parseOrThrow(filePath, schema, raw);
}

export function resolveFrom(baseDir: string, value: string): string {
  return path.isAbsolute(value) ? value : path.resolve(baseDir, value);
}

function parseOrThrow<T extends z.ZodTypeAny>(filePath: string, schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new PipelineError('config_invalid', `Configuracao invalida em ${filePath}: ${formatZodIssues(parsed.error)}`);
  }
  return parsed.data;
}
