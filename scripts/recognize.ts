#!/usr/bin/env node

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import process from 'node:process';
import { buildRecognizerConfig, loadConfig, loadEnvironment, readCredentials } from '../src/config.js';
import { SpeechRecognizer } from '../src/session/recognizer.js';
import { parsePacketFile } from '../src/utils/packetFile.js';

type ParsedArgs = {
  help: boolean;
  packets?: string;
  config?: string;
  env?: string;
  language?: string;
  sessionId?: string;
};

const USAGE = `
Recognize a dump of Opus packets

Usage:
  npm run recognize -- --packets <file.json> [options]

Options:
  --packets <path>     JSON array of base64 Opus packets (16 kHz mono, 60 ms frames)
  --config <path>      Config file (default: ./config.json)
  --env <path>         Env file with ASR_APP_ID / ASR_CLUSTER / ASR_ACCESS_TOKEN (default: ./.env)
  --language <code>    Override audio.language
  --session-id <id>    Session id used in logs and archive file names
  --help               Show this message
`;

function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = { help: false };
  for (let index = 0; index < argv.length; index += 1) {
    const raw = argv[index];
    if (!raw.startsWith('--')) {
      continue;
    }
    const [flag, inlineValue] = raw.includes('=') ? raw.split(/=(.*)/s) : [raw, undefined];
    const name = flag.replace(/^--/, '');
    if (name === 'help') {
      result.help = true;
      continue;
    }
    let value = inlineValue;
    if (value === undefined) {
      const next = argv[index + 1];
      if (next !== undefined && !next.startsWith('--')) {
        value = next;
        index += 1;
      }
    }
    if (!value) {
      console.warn(`Missing value for --${name}`);
      continue;
    }
    switch (name) {
      case 'packets':
        result.packets = value;
        break;
      case 'config':
        result.config = value;
        break;
      case 'env':
        result.env = value;
        break;
      case 'language':
        result.language = value;
        break;
      case 'session-id':
        result.sessionId = value;
        break;
      default:
        console.warn(`Unknown option: --${name}`);
    }
  }
  return result;
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (args.help || !args.packets) {
    console.log(USAGE);
    if (!args.help) process.exitCode = 1;
    return;
  }

  loadEnvironment(args.env);
  const appConfig = await loadConfig(args.config ? resolve(args.config) : undefined);
  const config = buildRecognizerConfig(
    args.language ? { ...appConfig, audio: { ...appConfig.audio, language: args.language } } : appConfig,
    readCredentials()
  );
  const packets = parsePacketFile(await readFile(resolve(args.packets), 'utf-8'));

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort(new Error('interrupted')));

  const recognizer = new SpeechRecognizer(config);
  const outcome = await recognizer.recognize(packets, { sessionId: args.sessionId, signal: controller.signal });
  if (outcome.error) {
    console.error(`recognition failed [${outcome.error.kind}${outcome.error.state ? ` @ ${outcome.error.state}` : ''}]: ${outcome.error.message}`);
    process.exitCode = 1;
    return;
  }
  console.log(outcome.text ?? '(no speech detected)');
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
