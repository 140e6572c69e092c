/**
 * Config command -- show the resolved configuration, or write the defaults.
 *
 * Usage:
 *   rigkeeper config [--config path]
 *   rigkeeper config --init [--config path]
 */

import type { RigkeeperConfig } from '@rigkeeper/core';
import { parseCommonArgs } from '../args.js';
import {
  configExists,
  ensureConfigDir,
  getConfigPath,
  getDefaultConfig,
  loadConfig,
  saveConfig,
} from '../config.js';
import { CHECK, DIM, RED, RESET, WARN } from '../ui.js';

const MASK = '********';

/** Copy of `config` safe to print: the endpoint password is masked. */
export function redactConfig(config: RigkeeperConfig): RigkeeperConfig {
  const { password } = config.endpoint;
  return {
    ...config,
    endpoint: { ...config.endpoint, password: password ? MASK : password },
  };
}

function init(configPath: string | undefined): void {
  const path = configPath ?? getConfigPath();
  if (configExists(path)) {
    console.log(`\n  ${WARN} Config already exists at ${path}; left unchanged.\n`);
    return;
  }
  if (configPath === undefined) ensureConfigDir();
  saveConfig(getDefaultConfig(), path);
  console.log(`\n  ${CHECK} Wrote default config to ${path}`);
  console.log(`  ${DIM}Set worker.path before running the keeper.${RESET}\n`);
}

export async function configCommand(args: string[]): Promise<void> {
  const { configPath, rest } = parseCommonArgs(args);

  if (rest.includes('--init')) {
    init(configPath);
    return;
  }

  let config: RigkeeperConfig;
  try {
    config = loadConfig(configPath);
  } catch (err) {
    const errMessage = err instanceof Error ? err.message : String(err);
    console.error(`\n  ${RED}Failed to load config:${RESET} ${errMessage}\n`);
    process.exitCode = 1;
    return;
  }

  console.log(JSON.stringify(redactConfig(config), null, 2));
}
