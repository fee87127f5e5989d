/**
 * Configuration module for cluster-scripter
 */

import dotenv from 'dotenv';
import { homedir } from 'os';
import { join } from 'path';
import { ConnectionMode, isConnectionMode } from './types.js';

// Load environment variables
dotenv.config();

export interface ScripterConfig {
  // Logging configuration
  logLevel: string;
  logFile?: string;

  // Credential configuration
  credentialsPath: string;
  headless: boolean;

  // Session configuration
  defaultSite: string;
  defaultMode: ConnectionMode;
  passwordPrompt: string;
  mfaPrompt: string;
  mfaOption: string;
  expectTimeout: number;

  // Execution configuration
  shell: string;
}

export const DEFAULT_CREDENTIALS_PATH = join(homedir(), '.cluster-scripter', 'config.txt');

class ConfigManager {
  private config: ScripterConfig;

  constructor() {
    this.config = this.loadConfig();
  }

  private loadConfig(): ScripterConfig {
    const mode = this.getEnv('CLUSTER_SCRIPTER_MODE', 'sftp').toLowerCase();

    return {
      // Logging configuration
      logLevel: this.getEnv('CLUSTER_SCRIPTER_LOG_LEVEL', 'info'),
      logFile: this.getEnv('CLUSTER_SCRIPTER_LOG_FILE', ''),

      // Credential configuration
      credentialsPath: this.getEnv('CLUSTER_SCRIPTER_CONFIG', DEFAULT_CREDENTIALS_PATH),
      headless: this.getBoolEnv('CLUSTER_SCRIPTER_HEADLESS', false),

      // Session configuration
      defaultSite: this.getEnv('CLUSTER_SCRIPTER_SITE', ''),
      defaultMode: isConnectionMode(mode) ? mode : 'sftp',
      passwordPrompt: this.getEnv('CLUSTER_SCRIPTER_PASSWORD_PROMPT', 'Password:'),
      mfaPrompt: this.getEnv('CLUSTER_SCRIPTER_MFA_PROMPT', 'Passcode or option (1-3):'),
      mfaOption: this.getEnv('CLUSTER_SCRIPTER_MFA_OPTION', '1'),
      expectTimeout: this.getIntEnv('CLUSTER_SCRIPTER_EXPECT_TIMEOUT', -1),

      // Execution configuration
      shell: this.getEnv('CLUSTER_SCRIPTER_SHELL', '/bin/sh')
    };
  }

  private getEnv(key: string, defaultValue: string): string {
    return process.env[key] || defaultValue;
  }

  private getIntEnv(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (value === undefined) return defaultValue;

    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? defaultValue : parsed;
  }

  private getBoolEnv(key: string, defaultValue: boolean): boolean {
    const value = process.env[key]?.toLowerCase();
    if (value === undefined) return defaultValue;

    if (value === 'true' || value === '1' || value === 'yes' || value === 'on') {
      return true;
    }
    if (value === 'false' || value === '0' || value === 'no' || value === 'off') {
      return false;
    }
    return defaultValue;
  }

  getConfig(): ScripterConfig {
    return { ...this.config };
  }
}

const configManager = new ConfigManager();
export default configManager.getConfig();
