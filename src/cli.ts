#!/usr/bin/env node
// stt-monitor: live script-vs-transcript scoring.
//
//   stt-monitor [monitor] [--reference <file>]
//   stt-monitor sink
//   stt-monitor score <reference-file> <hypothesis-file>

import http from 'node:http';
import { readFile } from 'node:fs/promises';
import readline from 'node:readline';
import { parseArgs } from 'node:util';
import { MonitorApp } from './app/monitor-app';
import { ConfigError, loadConfig, loadEnvFile, type MonitorConfig } from './config/monitor-config';
import { setLogLevel } from './env/dev-log';
import { createLogger, describeError } from './env/logging';
import { createScoreRelay, type ScoreRelay } from './net/score-relay';
import { SubtitleSink } from './net/subtitle-sink';
import { formatMetrics, renderLegend, renderTokensAnsi } from './renderer/tokens';
import { createTerminalView } from './renderer/terminal-view';
import { alignAndScore, createAligner } from './speech/scorer';

const log = createLogger('cli');

function setup(): MonitorConfig {
  const env = loadEnvFile();
  const config = loadConfig();
  setLogLevel(config.logLevel);
  if (env.loaded) log.info(`.env loaded from ${env.path}`);
  else log.warn(`.env not found at ${env.path}; starting with defaults`);
  return config;
}

function startRelay(config: MonitorConfig, app: MonitorApp): Promise<{ relay: ScoreRelay; server: http.Server }> {
  const relay = createScoreRelay({ accessToken: config.relay.accessToken });
  const server = http.createServer((req, res) => {
    if (relay.tryHandleApi(req, res)) return;
    res.statusCode = 404;
    res.end('not found');
  });
  relay.attach(server);
  app.subscribe((event) => {
    if (event.kind === 'score') relay.publish(event.snapshot);
    else if (event.kind === 'reset') relay.publishReset();
  });
  return new Promise<{ relay: ScoreRelay; server: http.Server }>((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.relay.port, config.host, () => {
      server.off('error', reject);
      log.info(`score relay on http://${config.host}:${config.relay.port}`);
      resolve({ relay, server });
    });
  });
}

async function runMonitor(referencePath: string | undefined): Promise<void> {
  const config = setup();
  const app = new MonitorApp(config);
  const view = createTerminalView(process.stdout, { color: Boolean(process.stdout.isTTY) });
  app.subscribe((event) => view.handle(event));

  const relayHandle = config.relay.port > 0 ? await startRelay(config, app) : null;
  if (referencePath) await app.loadReference(referencePath);
  await app.start();
  process.stdout.write(`${renderLegend()}\n`);
  process.stdout.write('commands: load <file> | reset | reconnect | quit\n');

  const rl = readline.createInterface({ input: process.stdin });
  let closing = false;
  const shutdown = async () => {
    if (closing) return;
    closing = true;
    rl.close();
    await app.stop();
    if (relayHandle) {
      relayHandle.relay.close();
      await new Promise<void>((resolve) => relayHandle.server.close(() => resolve()));
    }
  };

  rl.on('line', (line) => {
    const [cmd = '', ...rest] = line.trim().split(/\s+/);
    const arg = rest.join(' ');
    const run = async () => {
      switch (cmd.toLowerCase()) {
        case '':
          return;
        case 'load':
          if (!arg) throw new Error('usage: load <file>');
          await app.loadReference(arg);
          return;
        case 'reset':
          app.reset();
          return;
        case 'reconnect':
          await app.reconnectSubtitle();
          return;
        case 'quit':
        case 'exit':
          await shutdown();
          return;
        default:
          throw new Error(`unknown command: ${cmd}`);
      }
    };
    run().catch((err: unknown) => log.error(describeError(err)));
  });

  process.once('SIGINT', () => {
    shutdown().catch((err: unknown) => log.error('shutdown failed', describeError(err)));
  });
}

async function runSink(): Promise<void> {
  const config = setup();
  const sink = new SubtitleSink({ outPath: config.sink.rawOutPath, respCheckcode: config.subtitle.respCheckcode });
  await sink.listen(config.sink.port, config.sink.host);
  log.info('[CTRL+C] to stop server');
  process.once('SIGINT', () => {
    log.info('shutdown requested...');
    sink.close().catch((err: unknown) => log.error('close failed', describeError(err)));
  });
}

async function runScore(referencePath: string, hypothesisPath: string): Promise<void> {
  const config = setup();
  const [reference, hypothesis] = await Promise.all([
    readFile(referencePath, 'utf8'),
    readFile(hypothesisPath, 'utf8'),
  ]);
  const { tokens, metrics } = alignAndScore(reference, hypothesis, {
    threshold: config.scoring.threshold,
    aligner: createAligner(config.scoring.strategy, config.scoring.maxLookahead),
  });
  process.stdout.write(`${renderTokensAnsi(tokens)}\n${formatMetrics(metrics)}\n`);
}

async function main(argv: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      reference: { type: 'string', short: 'r' },
    },
  });
  const [command = 'monitor', ...rest] = positionals;
  switch (command) {
    case 'monitor':
      return runMonitor(values.reference);
    case 'sink':
      return runSink();
    case 'score': {
      const [referencePath, hypothesisPath] = rest;
      if (!referencePath || !hypothesisPath) {
        throw new Error('usage: stt-monitor score <reference-file> <hypothesis-file>');
      }
      return runScore(referencePath, hypothesisPath);
    }
    default:
      throw new Error(`unknown command: ${command}`);
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  if (err instanceof ConfigError) {
    for (const issue of err.issues) console.error(`[config] ${issue}`);
  } else {
    console.error('[cli]', describeError(err));
  }
  process.exitCode = 1;
});
