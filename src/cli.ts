#!/usr/bin/env node

/**
 * tagalog-translate
 *
 * Reads English text from a file or stdin, translates it to Tagalog (Filipino)
 * chunk by chunk, and writes the result to a file or stdout.
 *
 *   tagalog-translate -i input.txt -o output.tl.txt
 *   echo "Your text here" | tagalog-translate
 *   tagalog-translate -i input.txt --formal --glossary "Blue Butterfly,Jeet Kune Do"
 */

import { readFile, writeFile } from 'fs/promises';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { createTranslationOptions, parseGlossaryList } from './ai/options';
import { createOpenAIBackend } from './ai/providers/openai.provider';
import type { TranslationBackend } from './ai/providers/types';
import type { TranslationPlan } from './ai/types';
import { planTranslation, translateDocument } from './services/translation.service';
import { env } from './utils/env';
import { logger } from './utils/logger';

type CliOptions = {
  input?: string;
  output?: string;
  model?: string;
  formal?: boolean;
  glossary?: string;
  maxWords?: number;
  concurrency?: number;
  dryRun?: boolean;
};

export type CliIO = {
  readText(path?: string): Promise<string>;
  writeText(text: string, path?: string): Promise<void>;
  writeError(message: string): void;
  createBackend(): TranslationBackend;
};

const readStdin = async (): Promise<string> => {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
};

const defaultIO: CliIO = {
  readText: (path) => (path ? readFile(path, 'utf-8') : readStdin()),
  writeText: async (text, path) => {
    if (path) {
      await writeFile(path, text, 'utf-8');
      return;
    }
    process.stdout.write(text);
  },
  writeError: (message) => {
    process.stderr.write(`${message}\n`);
  },
  createBackend: () => createOpenAIBackend(),
};

const parseInteger = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
};

const createProgram = (io: CliIO) =>
  new Command()
    .name('tagalog-translate')
    .description('Translate text to Tagalog (Filipino) using OpenAI.')
    .option('-i, --input <path>', 'path to input text file; omit to read from stdin')
    .option('-o, --output <path>', 'path to write translated text; omit to print to stdout')
    .option('--model <id>', `OpenAI model (default: ${env.openAiModel})`)
    .option('--formal', 'use a more formal Tagalog tone')
    .option('--glossary <terms>', 'comma-separated terms to keep in their original form')
    .option('--max-words <n>', `max words per chunk (default: ${env.maxWordsPerChunk})`, parseInteger)
    .option('--concurrency <n>', 'chunks translated in parallel (default: 1)', parseInteger)
    .option('--dry-run', 'print the chunk plan and instruction without calling the backend')
    .configureOutput({ writeErr: (message) => io.writeError(message.trimEnd()) })
    .exitOverride();

export const renderPlan = (plan: TranslationPlan): string => {
  const lines = [
    `Chunks: ${plan.chunks.length} (${plan.totalWords} words)`,
    ...plan.chunks.map(
      (chunk) =>
        `  #${chunk.index + 1}: ${chunk.wordCount} words, ${chunk.paragraphs.length} paragraph(s)${
          chunk.oversized ? ' [oversized]' : ''
        }`,
    ),
    '',
    'Instruction:',
    plan.instruction,
  ];
  return `${lines.join('\n')}\n`;
};

/**
 * Run the CLI with user arguments (without the node and script paths).
 * Resolves to the process exit code.
 */
export const runCli = async (argv: string[], io: CliIO = defaultIO): Promise<number> => {
  const program = createProgram(io);
  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const cli = program.opts<CliOptions>();

  try {
    const options = createTranslationOptions({
      tone: cli.formal ? 'formal' : 'informal',
      glossary: parseGlossaryList(cli.glossary),
      model: cli.model,
      maxWordsPerChunk: cli.maxWords,
      concurrency: cli.concurrency,
    });

    const text = await io.readText(cli.input);
    const plan = planTranslation(text, options);

    if (cli.dryRun) {
      await io.writeText(renderPlan(plan));
      return 0;
    }

    const backend = io.createBackend();
    const result = await translateDocument(text, options, backend);
    await io.writeText(result.text, cli.output);

    if (cli.output) {
      logger.info({ output: cli.output, chunks: result.chunkCount }, 'Translation written');
    }
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.writeError(`ERROR: ${message}`);
    return 1;
  }
};

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      process.stderr.write(`ERROR: ${error instanceof Error ? error.message : String(error)}\n`);
      process.exitCode = 1;
    });
}
