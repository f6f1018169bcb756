#!/usr/bin/env node

/**
 * url-brief CLI
 *
 * Usage:
 *   url-brief prompt <url>                 - Print the summarisation prompt for a thread or video
 *   url-brief prompt <url> --json          - Same, as a JSON envelope
 *   url-brief models                       - List the models installed on the Ollama server
 *   url-brief chat <url> --model <name>    - Generate the prompt and send it to a model
 *   url-brief serve [--port 8050]          - Start the web form and JSON API
 */

import { Command, InvalidArgumentError } from 'commander';
import ora from 'ora';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { loadConfig, type AppConfig } from './config.js';
import { OllamaChatBackend, runChat, type ChatBackend } from './core/chat.js';
import { createSources, generatePrompt, statusForError, successStatus } from './core/pipeline.js';
import type { SourceRegistry } from './core/sources.js';
import { startServer } from './server/app.js';
import { errorMessage, type PromptOutcome } from './types.js';
import { VERSION } from './version.js';

export interface CliDependencies {
  config?: AppConfig;
  sources?: SourceRegistry;
  chatBackend?: ChatBackend;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

export function createProgram(deps: CliDependencies = {}): Command {
  // Config is read lazily so `--help` works with a broken environment
  let config: AppConfig | undefined = deps.config;
  const getConfig = (): AppConfig => {
    if (!config) config = loadConfig();
    return config;
  };
  const getSources = (): SourceRegistry => deps.sources ?? createSources({
    requestTimeoutMs: getConfig().requestTimeoutMs,
    maxCommentDepth: getConfig().maxCommentDepth,
  });
  const getBackend = (): ChatBackend => deps.chatBackend ?? new OllamaChatBackend({
    host: getConfig().ollamaHost,
    chatTimeoutMs: getConfig().chatTimeoutMs,
    modelsTimeoutMs: getConfig().modelsTimeoutMs,
  });

  const program = new Command();

  program
    .name('url-brief')
    .description('Turn a Reddit thread or YouTube video into a summarisation prompt for a local LLM')
    .version(VERSION);

  /** Runs the pipeline behind a spinner; prints the failure banner and returns null on error. */
  async function buildPrompt(url: string, silent: boolean, json: boolean): Promise<PromptOutcome | null> {
    const spinner = silent || json ? null : ora('Fetching...').start();
    try {
      const outcome = await generatePrompt(url, getSources());
      if (spinner) spinner.succeed(successStatus(outcome).message.replace(/^✅ /, ''));
      return outcome;
    } catch (err) {
      const status = statusForError(err);
      if (spinner) spinner.fail('Prompt generation failed');
      if (json) {
        console.log(JSON.stringify({ success: false, prompt: '', status, error: { message: errorMessage(err) } }, null, 2));
      } else {
        console.error(status.message);
      }
      if (process.env.DEBUG && err instanceof Error) console.debug('[url-brief]', err.stack);
      process.exitCode = 1;
      return null;
    }
  }

  program
    .command('prompt <url>')
    .description('Print the summarisation prompt for a Reddit thread or YouTube video')
    .option('--json', 'Output as JSON')
    .option('-s, --silent', 'No spinner output')
    .action(async (url: string, options: { json?: boolean; silent?: boolean }) => {
      const json = options.json ?? false;
      const outcome = await buildPrompt(url, options.silent ?? false, json);
      if (!outcome) return;

      if (json) {
        console.log(JSON.stringify({
          success: true,
          source: outcome.source,
          prompt: outcome.prompt,
          status: successStatus(outcome),
        }, null, 2));
      } else {
        console.log(outcome.prompt);
      }
    });

  program
    .command('models')
    .description('List the models installed on the Ollama server')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      const backend = getBackend();
      try {
        const models = await backend.listModels();
        if (options.json) {
          console.log(JSON.stringify({ models, selected: models[0] ?? null }, null, 2));
        } else if (models.length === 0) {
          console.error(`No ${backend.label} models installed.`);
        } else {
          for (const name of models) console.log(name);
        }
      } catch (err) {
        console.error(`Could not list ${backend.label} models: ${errorMessage(err)}`);
        process.exitCode = 1;
      }
    });

  program
    .command('chat <url>')
    .description('Generate the prompt for a URL and send it to a local model')
    .option('-m, --model <name>', 'Model to run (see `url-brief models`)')
    .option('-s, --silent', 'No spinner output')
    .action(async (url: string, options: { model?: string; silent?: boolean }) => {
      const silent = options.silent ?? false;
      const outcome = await buildPrompt(url, silent, false);
      if (!outcome) return;

      const backend = getBackend();
      const spinner = silent ? null : ora(`Running ${options.model ?? 'model'}...`).start();
      // runChat never throws; dispatch failures come back as the reply text
      const reply = await runChat(backend, options.model, outcome.prompt);
      if (spinner) spinner.stop();
      console.log(reply);
    });

  program
    .command('serve')
    .description('Start the web form and JSON API')
    .option('-p, --port <port>', 'Port to listen on', parsePort)
    .option('-H, --host <host>', 'Interface to bind')
    .action((options: { port?: number; host?: string }) => {
      const base = getConfig();
      startServer(
        {
          ...base,
          port: options.port ?? base.port,
          host: options.host ?? base.host,
        },
        { sources: deps.sources, chatBackend: deps.chatBackend },
      );
    });

  return program;
}

function isDirectRun(): boolean {
  if (!process.argv[1]) return false;
  try {
    // npm installs the bin as a symlink
    return realpathSync(process.argv[1]) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isDirectRun()) {
  createProgram().parseAsync(process.argv).catch((err: unknown) => {
    console.error(errorMessage(err));
    process.exit(1);
  });
}
