/**
 * Startup self-test: validates bridge and recorder configuration before
 * anything connects or records.
 */

import { existsSync } from 'fs';
import { type ConfigOverrides, loadConfig } from '../config/config-loader.js';
import { ENV_BRIDGE_URL, ENV_CONFIG_PATH, MIN_NODE_VERSION } from '../constants.js';
import { errorMessage } from '../errors.js';
import { describeScope, resolveTopicScope } from '../recorder/topic-filter.js';

export type CheckStatus = 'ok' | 'warn' | 'fail';

export interface StartupCheckResult {
  passed: boolean;
  checks: { name: string; status: CheckStatus; message: string }[];
}

export function runStartupChecks(config: {
  bridgeUrl: string;
  configPath?: string;
  overrides?: ConfigOverrides;
  nodeVersion?: string;
}): StartupCheckResult {
  const checks: StartupCheckResult['checks'] = [];

  // 1. Bridge URL format
  let bridgeUrl: URL | null = null;
  try {
    bridgeUrl = new URL(config.bridgeUrl);
  } catch {
    checks.push({ name: 'bridge-url', status: 'fail', message: `Invalid bridge URL: ${config.bridgeUrl}` });
  }

  if (bridgeUrl) {
    if (bridgeUrl.protocol !== 'ws:' && bridgeUrl.protocol !== 'wss:') {
      checks.push({
        name: 'bridge-url',
        status: 'fail',
        message: `Bridge URL must use ws:// or wss:// protocol, got: ${bridgeUrl.protocol}`,
      });
    } else {
      checks.push({ name: 'bridge-url', status: 'ok', message: `Bridge URL: ${config.bridgeUrl}` });
    }

    // 2. Bridge port (WHATWG URL already rejects ports above 65535)
    if (bridgeUrl.port) {
      const port = parseInt(bridgeUrl.port, 10);
      if (isNaN(port) || port < 1) {
        checks.push({ name: 'bridge-port', status: 'fail', message: `Bridge port must be between 1 and 65535, got: ${bridgeUrl.port}` });
      } else {
        checks.push({ name: 'bridge-port', status: 'ok', message: `Bridge port: ${port}` });
      }
    } else {
      checks.push({ name: 'bridge-port', status: 'ok', message: 'Bridge port: default' });
    }
  } else {
    checks.push({ name: 'bridge-port', status: 'fail', message: 'Cannot validate port: bridge URL is invalid' });
  }

  // 3. Bridge URL env var
  const envBridgeUrl = process.env[ENV_BRIDGE_URL];
  if (envBridgeUrl !== undefined) {
    let protocol: string | null = null;
    try {
      protocol = new URL(envBridgeUrl).protocol;
    } catch {
      checks.push({ name: 'env-bridge-url', status: 'fail', message: `${ENV_BRIDGE_URL} is not a valid URL: ${envBridgeUrl}` });
    }
    if (protocol !== null && protocol !== 'ws:' && protocol !== 'wss:') {
      checks.push({ name: 'env-bridge-url', status: 'fail', message: `${ENV_BRIDGE_URL} must use ws:// or wss://, got: ${protocol}` });
    } else if (protocol !== null) {
      checks.push({ name: 'env-bridge-url', status: 'ok', message: `${ENV_BRIDGE_URL}: ${envBridgeUrl}` });
    }
  }

  // 4. Config path env var
  const envConfigPath = process.env[ENV_CONFIG_PATH];
  if (envConfigPath !== undefined) {
    if (existsSync(envConfigPath)) {
      checks.push({ name: 'env-config-path', status: 'ok', message: `${ENV_CONFIG_PATH} file exists: ${envConfigPath}` });
    } else {
      checks.push({ name: 'env-config-path', status: 'fail', message: `${ENV_CONFIG_PATH} file not found: ${envConfigPath}` });
    }
  }

  // 5. Config (file plus command-line overrides) loads and validates
  const overrides = config.overrides ?? {};
  if (config.configPath || Object.keys(overrides).length > 0) {
    try {
      const loaded = loadConfig(config.configPath, overrides);
      checks.push({
        name: 'config-file',
        status: 'ok',
        message: `Config loaded: ${describeScope(resolveTopicScope(loaded.loggedTopics))} every ${loaded.fileDuration}s`,
      });
      if (existsSync(loaded.dataFolder)) {
        checks.push({ name: 'data-folder', status: 'ok', message: `Data folder: ${loaded.dataFolder}` });
      } else {
        checks.push({ name: 'data-folder', status: 'warn', message: `Data folder ${loaded.dataFolder} does not exist yet and will be created` });
      }
    } catch (err) {
      checks.push({ name: 'config-file', status: 'fail', message: errorMessage(err) });
    }
  } else {
    checks.push({ name: 'config-file', status: 'ok', message: 'Using default configuration' });
  }

  // 6. Node.js version
  const version = config.nodeVersion ?? process.version;
  const major = parseInt(version.replace(/^v/, ''), 10);
  if (isNaN(major) || major < MIN_NODE_VERSION) {
    checks.push({ name: 'node-version', status: 'fail', message: `Node.js >= ${MIN_NODE_VERSION} required, got: ${version}` });
  } else {
    checks.push({ name: 'node-version', status: 'ok', message: `Node.js ${version}` });
  }

  const passed = checks.every(c => c.status !== 'fail');

  return { passed, checks };
}

export function printStartupChecks(result: StartupCheckResult): void {
  for (const check of result.checks) {
    const icon = check.status === 'ok' ? '[OK]' : check.status === 'warn' ? '[WARN]' : '[FAIL]';
    console.error(`[StartupCheck] ${icon} ${check.name}: ${check.message}`);
  }
  if (!result.passed) {
    console.error('[StartupCheck] Startup checks FAILED. Fix the issues above and try again.');
  }
}
