/**
 * Type definitions for cluster-scripter
 */

// Connection Types
export const CONNECTION_MODES = ['sftp', 'ssh'] as const;
export type ConnectionMode = (typeof CONNECTION_MODES)[number];

export function isConnectionMode(value: string): value is ConnectionMode {
  const known: readonly string[] = CONNECTION_MODES;
  return known.includes(value);
}

// Credential Types
export interface Credentials {
  username: string;
  password: string;
  group?: string;
  site?: string;
}

export type PartialCredentials = Partial<Credentials>;

export const CREDENTIAL_KEYS = ['username', 'password', 'group', 'site'] as const;
export type CredentialKey = (typeof CREDENTIAL_KEYS)[number];

// Interactive prompting
export interface Prompter {
  say(message: string): void;
  ask(question: string): Promise<string>;
  askSecret(question: string): Promise<string>;
  close(): void;
}

// Script execution
export interface ScriptExecutor {
  execute(script: string): void;
}

// Transfer Types
export type TransferKind = 'get' | 'put';

export interface TransferOptions {
  outdir?: string;
  newName?: string;
  options?: readonly string[];
}

export interface PutOptions extends TransferOptions {
  setPermissions?: boolean;
}

// Scripter Types
export interface ScripterOptions {
  mode?: ConnectionMode;
  site?: string;
  group?: string | number;
  passwordPrompt?: string;
  mfaPrompt?: string;
  mfaOption?: string;
  expectTimeout?: number;
  executor?: ScriptExecutor;
}

export interface ScripterCreateOptions extends ScripterOptions {
  username?: string;
  password?: string;
  configPath?: string;
  headless?: boolean;
  save?: boolean;
  overwrite?: boolean;
  prompter?: Prompter;
}

export interface RenderOptions {
  redact?: boolean;
}
