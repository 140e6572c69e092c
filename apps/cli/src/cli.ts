/**
 * Command dispatch for the rigkeeper binary.
 */

import { configCommand } from './commands/config.js';
import { probe } from './commands/probe.js';
import { run } from './commands/run.js';
import { BOLD, DIM, RED, RESET, TEAL } from './ui.js';

export const VERSION = '0.1.0';

export function helpText(): string {
  return [
    '',
    `  ${TEAL}${BOLD}rigkeeper${RESET} ${DIM}v${VERSION}${RESET}`,
    '  Keeps a worker process alive, fast enough and periodically restarted.',
    '',
    `  ${BOLD}Usage${RESET}`,
    '    rigkeeper <command> [--config path]',
    '',
    `  ${BOLD}Commands${RESET}`,
    '    run              Supervise the worker until interrupted',
    '    probe            Read the throughput once; exit 1 unless it meets target',
    '    config           Print the resolved configuration',
    '    config --init    Write the default configuration',
    '    help             Show this help',
    '',
    `  ${DIM}Config: ~/.rigkeeper/config.json   Logs: ~/.rigkeeper/logs/${RESET}`,
    '',
  ].join('\n');
}

export async function main(argv: readonly string[]): Promise<void> {
  const [command = 'help', ...rest] = argv;

  switch (command) {
    case 'run':
      await run(rest);
      return;
    case 'probe':
      await probe(rest);
      return;
    case 'config':
      await configCommand(rest);
      return;
    case 'help':
    case '--help':
    case '-h':
      console.log(helpText());
      return;
    case 'version':
    case '--version':
    case '-v':
      console.log(VERSION);
      return;
    default:
      console.error(`\n  ${RED}Unknown command:${RESET} ${command}`);
      console.log(helpText());
      process.exitCode = 1;
  }
}
