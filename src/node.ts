import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { resolve, dirname, basename, extname, join } from 'node:path';
import {
  hideMessage,
  removeMessage,
  revealMessage,
  listChunks,
} from './operations/message.js';
import type { ChunkSummary, FileOutputOptions, FileWriteResult, MessageOptions } from './types.js';

export type FileMessageOptions = MessageOptions & FileOutputOptions;

function resolveOutputPath(absInput: string, options: FileOutputOptions, defaultSuffix: string): string {
  if (options.outputPath) {
    return resolve(options.outputPath);
  }
  if (options.inPlace) {
    return absInput;
  }
  const dir = dirname(absInput);
  const ext = extname(absInput);
  const name = basename(absInput, ext);
  const suffix = options.suffix ?? defaultSuffix;
  return join(dir, `${name}${suffix}${ext}`);
}

async function readBytes(absPath: string): Promise<Uint8Array> {
  return new Uint8Array(await readFile(absPath));
}

async function writeBytes(absPath: string, data: Uint8Array): Promise<void> {
  await mkdir(dirname(absPath), { recursive: true });
  await writeFile(absPath, data);
}

/**
 * Hide `message` in a PNG file. Writes `<name>-stash.png` beside the input
 * unless `outputPath` or `inPlace` say otherwise.
 */
export async function hideMessageInFile(
  inputPath: string,
  message: string,
  options: FileMessageOptions = {}
): Promise<FileWriteResult> {
  const absInput = resolve(inputPath);
  const original = await readBytes(absInput);
  const { data, added } = hideMessage(original, message, options);
  const absOutput = resolveOutputPath(absInput, options, '-stash');
  await writeBytes(absOutput, data);

  return {
    inputPath: absInput,
    outputPath: absOutput,
    originalSize: original.length,
    outputSize: data.length,
    chunk: added,
  };
}

/**
 * Remove the first message chunk from a PNG file. Writes
 * `<name>-unstash.png` beside the input unless told otherwise.
 */
export async function removeMessageFromFile(
  inputPath: string,
  options: FileMessageOptions = {}
): Promise<FileWriteResult> {
  const absInput = resolve(inputPath);
  const original = await readBytes(absInput);
  const { data, removed } = removeMessage(original, options);
  const absOutput = resolveOutputPath(absInput, options, '-unstash');
  await writeBytes(absOutput, data);

  return {
    inputPath: absInput,
    outputPath: absOutput,
    originalSize: original.length,
    outputSize: data.length,
    chunk: removed,
  };
}

export async function revealMessageFromFile(
  inputPath: string,
  options: MessageOptions = {}
): Promise<string> {
  return revealMessage(await readBytes(resolve(inputPath)), options);
}

export async function listChunksInFile(inputPath: string): Promise<ChunkSummary[]> {
  return listChunks(await readBytes(resolve(inputPath)));
}
