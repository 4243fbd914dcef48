import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import type { z } from 'zod';

export type ReadResult<T = unknown> = { status: 'ok'; value: T } | { status: 'missing' } | { status: 'invalid'; error: string };

/**
 * Writes a JSON document so that readers see either the previous file or the
 * complete new one: the content goes to a temp file beside the target, which is
 * then renamed over it.
 */
export async function writeJsonAtomic(path: string, value: unknown): Promise<void> {
  const directory = dirname(path);
  await mkdir(directory, { recursive: true });

  const tempPath = join(directory, `.${basename(path)}.${randomUUID()}.tmp`);
  try {
    await writeFile(tempPath, `${JSON.stringify(value, null, 2)}\n`, 'utf8');
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

async function readJsonDocument(path: string): Promise<ReadResult> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return { status: 'missing' };
    }
    return { status: 'invalid', error: error instanceof Error ? error.message : String(error) };
  }

  try {
    return { status: 'ok', value: JSON.parse(text) };
  } catch (error) {
    return { status: 'invalid', error: error instanceof Error ? error.message : String(error) };
  }
}

/** Reads a JSON document and decodes it with `schema`; the first issue becomes the error. */
export async function readJsonAs<S extends z.ZodTypeAny>(path: string, schema: S): Promise<ReadResult<z.output<S>>> {
  const document = await readJsonDocument(path);
  if (document.status !== 'ok') {
    return document;
  }

  const parsed = schema.safeParse(document.value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return {
      status: 'invalid',
      error: issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : parsed.error.message
    };
  }
  return { status: 'ok', value: parsed.data };
}
