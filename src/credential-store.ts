import { promises as fs } from 'fs';
import { homedir } from 'os';
import { dirname, isAbsolute, resolve } from 'path';
import config from './config.js';
import { ErrorFactory } from './errors.js';
import { createLogger } from './logger.js';
import { TerminalPrompter } from './prompter.js';
import {
  CREDENTIAL_KEYS,
  CredentialKey,
  Credentials,
  PartialCredentials,
  Prompter
} from './types.js';

const logger = createLogger('CredentialStore');

const REQUIRED_KEYS = ['username', 'password'] as const;

function isCredentialKey(value: string): value is CredentialKey {
  const known: readonly string[] = CREDENTIAL_KEYS;
  return known.includes(value);
}

/**
 * Expands a leading `~` and makes the path absolute. A `~` anywhere past the
 * first segment is rejected rather than silently treated as a directory name.
 */
export function resolveConfigPath(configPath: string = config.credentialsPath): string {
  const segments = configPath.split(/[\\/]/);
  if (segments.slice(1).includes('~')) {
    throw ErrorFactory.invalidConfigPath(configPath);
  }

  let expanded = configPath;
  if (segments[0] === '~') {
    expanded = homedir() + configPath.slice(1);
  }
  return isAbsolute(expanded) ? expanded : resolve(expanded);
}

/**
 * Parses `key=value` lines into whatever credentials they carry.
 * Blank lines, `#` comments, unknown keys and empty values are skipped.
 */
export function parseCredentials(content: string): PartialCredentials {
  const credentials: PartialCredentials = {};

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) {
      continue;
    }

    const equalIndex = line.indexOf('=');
    if (equalIndex === -1) {
      logger.debug('Skipping line without "="');
      continue;
    }

    const key = line.substring(0, equalIndex).trim().toLowerCase();
    const value = line.substring(equalIndex + 1).trim();
    if (isCredentialKey(key) && value) {
      credentials[key] = value;
    }
  }

  return credentials;
}

export function formatCredentials(credentials: Credentials): string {
  const lines = [
    `username=${credentials.username}`,
    `password=${credentials.password}`
  ];
  if (credentials.site) {
    lines.push(`site=${credentials.site}`);
  }
  if (credentials.group) {
    lines.push(`group=${credentials.group}`);
  }
  return lines.join('\n') + '\n';
}

export function missingCredentials(credentials: PartialCredentials): string[] {
  return REQUIRED_KEYS.filter((key) => !credentials[key]);
}

function isComplete(credentials: PartialCredentials): credentials is Credentials {
  return missingCredentials(credentials).length === 0;
}

export interface CompletionOptions {
  resetUsername?: boolean;
  resetPassword?: boolean;
  /** Also ask for a missing group and site (first-time collection). */
  includeOptional?: boolean;
}

async function askUsername(prompter: Prompter): Promise<string> {
  for (;;) {
    const username = await prompter.ask('Username:\n> ');
    prompter.say(`The username you entered is: ${username}`);
    const confirmation = await prompter.ask('Is this correct? (Y/n)\n> ');
    if (confirmation.trim().toLowerCase() !== 'n') {
      return username;
    }
  }
}

/**
 * Asks for the username and password the partial record lacks (or that a
 * reset flag names) and returns the completed record. Group and site are
 * only asked for with `includeOptional`. The input is not mutated.
 */
export async function completeCredentials(
  partial: PartialCredentials,
  prompter: Prompter,
  options: CompletionOptions = {}
): Promise<Credentials> {
  prompter.say('Collecting your cluster login information to speed up future interactions:');

  let username = partial.username;
  if (!username || options.resetUsername) {
    username = await askUsername(prompter);
  }

  let password = partial.password;
  if (!password || options.resetPassword) {
    password = await prompter.askSecret('Password:\n> ');
  }

  const credentials: Credentials = { username, password };

  let group = partial.group;
  if (!group && options.includeOptional) {
    group = await prompter.ask(
      'Enter a group name (or octal - must be octal for sftp) for permissions-setting or skip by hitting enter:\n> '
    );
  }
  if (group) {
    credentials.group = group;
  }

  let site = partial.site;
  if (!site && options.includeOptional) {
    site = await prompter.ask("Enter the site you're trying to reach (or skip by hitting enter):\n> ");
  }
  if (site) {
    credentials.site = site;
  }

  return credentials;
}

export interface ResolveOptions {
  supplied?: PartialCredentials;
  save?: boolean;
  overwrite?: boolean;
  headless?: boolean;
}

/**
 * Resolves login credentials from supplied values, the credentials file and,
 * as a last resort, the prompter. Holds the resolved set afterwards.
 *
 * Without a prompter the store asks on the terminal and closes that prompter
 * once each resolve or reset is done.
 */
export class CredentialStore {
  readonly path: string;
  private credentials?: Credentials;
  private readonly prompter: Prompter;
  private readonly ownsPrompter: boolean;

  constructor(configPath: string | undefined, prompter?: Prompter) {
    this.path = resolveConfigPath(configPath);
    this.prompter = prompter ?? new TerminalPrompter();
    this.ownsPrompter = prompter === undefined;
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.path);
      return true;
    } catch {
      return false;
    }
  }

  async read(): Promise<PartialCredentials> {
    const content = await fs.readFile(this.path, 'utf8');
    const credentials = parseCredentials(content);
    logger.debug(`Read ${Object.keys(credentials).length} credential values from: ${this.path}`);
    return credentials;
  }

  async write(credentials: Credentials): Promise<void> {
    await fs.mkdir(dirname(this.path), { recursive: true });
    await fs.writeFile(this.path, formatCredentials(credentials), { encoding: 'utf8', mode: 0o600 });
    logger.info(`Wrote credentials to ${this.path}`);
  }

  async resolve(options: ResolveOptions = {}): Promise<Credentials> {
    try {
      return await this.resolveCredentials(options);
    } finally {
      this.release();
    }
  }

  async resetUsername(): Promise<Credentials> {
    return this.reset({ resetUsername: true });
  }

  async resetPassword(): Promise<Credentials> {
    return this.reset({ resetPassword: true });
  }

  private async resolveCredentials(options: ResolveOptions): Promise<Credentials> {
    const { supplied = {}, save = true, overwrite = false, headless = false } = options;
    const fileExists = await this.exists();

    let merged: PartialCredentials = this.defined(supplied);
    if (!isComplete(merged) && fileExists) {
      merged = { ...(await this.read()), ...merged };
    }

    let credentials: Credentials;
    if (isComplete(merged)) {
      credentials = merged;
    } else if (headless) {
      throw ErrorFactory.missingCredentials(this.path, missingCredentials(merged));
    } else {
      if (!fileExists) {
        this.prompter.say(`Requested config not found (${this.path}).\nGathering credentials...`);
      }
      credentials = await completeCredentials(merged, this.prompter, { includeOptional: !fileExists });
    }

    if ((save && !fileExists) || overwrite) {
      this.prompter.say(`Writing out credentials to ${this.path}`);
      await this.write(credentials);
    }

    this.credentials = credentials;
    return credentials;
  }

  private async reset(options: CompletionOptions): Promise<Credentials> {
    try {
      const current = this.credentials ?? (await this.resolveCredentials({}));
      const credentials = await completeCredentials(current, this.prompter, options);
      await this.write(credentials);
      this.credentials = credentials;
      return credentials;
    } finally {
      this.release();
    }
  }

  private release(): void {
    if (this.ownsPrompter) {
      this.prompter.close();
    }
  }

  private defined(values: PartialCredentials): PartialCredentials {
    const result: PartialCredentials = {};
    for (const key of CREDENTIAL_KEYS) {
      const value = values[key];
      if (value) {
        result[key] = value;
      }
    }
    return result;
  }
}
