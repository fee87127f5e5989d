import { posix } from 'path';
import config from './config.js';
import { CredentialStore } from './credential-store.js';
import { ErrorFactory } from './errors.js';
import { createLogger } from './logger.js';
import { ShellScriptExecutor } from './script-executor.js';
import { Step, renderSteps } from './step.js';
import {
  ConnectionMode,
  Credentials,
  PutOptions,
  RenderOptions,
  ScriptExecutor,
  ScripterCreateOptions,
  ScripterOptions,
  TransferKind,
  TransferOptions,
  isConnectionMode
} from './types.js';

export const REDACTED = '********';

type StepPart = string | number | null | undefined;

/**
 * Builds an expect script that logs into a cluster over sftp or ssh and
 * replays a prescribed list of commands.
 *
 * Nothing here checks whether a command worked on the remote side. If a
 * command is wrong, the terminal output of the session is the only place
 * that says so.
 */
export class Scripter {
  readonly mode: ConnectionMode;
  readonly site?: string;
  group?: string;

  private credentials: Credentials;
  private steps: Step[] = [];
  private readonly executor: ScriptExecutor;
  private readonly passwordPrompt: string;
  private readonly mfaPrompt: string;
  private readonly mfaOption: string;
  private readonly expectTimeout: number;
  private readonly store?: CredentialStore;
  private logger = createLogger('Scripter');

  constructor(credentials: Credentials, options: ScripterOptions = {}, store?: CredentialStore) {
    const mode = options.mode ?? config.defaultMode;
    if (!isConnectionMode(mode)) {
      throw ErrorFactory.invalidConfig('mode', mode);
    }

    this.mode = mode;
    this.credentials = { ...credentials };
    this.site = options.site || credentials.site || config.defaultSite || undefined;
    this.group = options.group !== undefined && options.group !== ''
      ? String(options.group)
      : credentials.group;
    this.executor = options.executor ?? new ShellScriptExecutor();
    this.passwordPrompt = options.passwordPrompt ?? config.passwordPrompt;
    this.mfaPrompt = options.mfaPrompt ?? config.mfaPrompt;
    this.mfaOption = options.mfaOption ?? config.mfaOption;
    this.expectTimeout = options.expectTimeout ?? config.expectTimeout;
    this.store = store;

    this.logger.debug(`Scripter ready: ${this.mode} session to ${this.site ?? '(no site yet)'}`);
  }

  /**
   * Resolves credentials (arguments, then the credentials file, then the
   * terminal) and returns a Scripter for them.
   */
  static async create(options: ScripterCreateOptions = {}): Promise<Scripter> {
    const store = new CredentialStore(options.configPath, options.prompter);
    const group = options.group !== undefined ? String(options.group) : undefined;

    const credentials = await store.resolve({
      supplied: {
        username: options.username,
        password: options.password,
        group,
        site: options.site || config.defaultSite || undefined
      },
      save: options.save,
      overwrite: options.overwrite,
      headless: options.headless ?? config.headless
    });

    return new Scripter(credentials, options, store);
  }

  get username(): string {
    return this.credentials.username;
  }

  /** Copy of the resolved credentials, password included. */
  getCredentials(): Credentials {
    return { ...this.credentials };
  }

  /** The prompt a step waits for unless told otherwise. */
  get defaultPrompt(): string {
    return this.mode === 'sftp' ? 'sftp>' : this.credentials.username;
  }

  get exitCommand(): string {
    return this.mode === 'sftp' ? 'quit' : 'exit';
  }

  // Step builders

  addStep(command: string, expect?: string): this {
    this.steps.push(new Step(expect || this.defaultPrompt, command));
    return this;
  }

  /** Joins the non-empty parts with spaces and adds them as one command. */
  basicStep(...parts: StepPart[]): this {
    const command = parts
      .filter((part): part is string | number => part !== undefined && part !== null && part !== '')
      .map(String)
      .join(' ');
    if (command) {
      this.addStep(command);
    }
    return this;
  }

  pwd(): this {
    return this.addStep('pwd');
  }

  list(path: string = '.'): this {
    return this.basicStep('ls -la', path || '.');
  }

  changeDirectory(path: string, local: boolean = false): this {
    if (local && this.mode !== 'sftp') {
      throw ErrorFactory.unsupportedOperation('lcd', this.mode);
    }
    return this.basicStep(local ? 'lcd' : 'cd', path);
  }

  /**
   * Changes permissions (default 0664, rw-rw-r--) and, when a group is known,
   * the group of each path. sftp only understands numeric values for both.
   *
   * Setting permissions on whole directories has been seen to leave their
   * contents unreachable (every permission shows as `?`). Target files
   * individually; getting and putting the files again usually repairs it.
   */
  setPermissions(paths: readonly string[], group?: string | number, mode: string | number = '0664'): this {
    const { effectiveGroup, octal } = this.permissionValues(group, mode);

    for (const path of paths) {
      this.basicStep('chmod', octal, path);
      if (effectiveGroup) {
        this.basicStep('chgrp', effectiveGroup, path);
      }
    }
    return this;
  }

  transfer(kind: TransferKind, file: string, local: boolean, options: TransferOptions = {}): this {
    this.checkTransfer(kind, file);

    const { outdir, newName, options: flags = [] } = options;
    if (outdir) {
      this.changeDirectory(outdir, local);
    }

    const flagString = flags.length > 0 ? `-${flags.join('')}` : undefined;
    return this.basicStep(kind, flagString, file, newName);
  }

  /** Downloads `file`, first moving the local side into `outdir` if given. */
  get(file: string, options: TransferOptions = {}): this {
    return this.transfer('get', file, true, options);
  }

  /**
   * Uploads `file`. With `outdir`, the remote directory is created (an
   * "already exists" complaint from sftp is harmless) and entered first.
   */
  put(file: string, options: PutOptions = {}): this {
    this.checkTransfer('put', file);
    if (options.setPermissions) {
      this.permissionValues();
    }

    if (options.outdir) {
      this.addStep(`mkdir ${options.outdir}`);
    }
    this.transfer('put', file, false, options);
    if (options.setPermissions) {
      // the remote side is already inside outdir, so the bare name is enough
      this.setPermissions([options.newName || posix.basename(file)]);
    }
    return this;
  }

  // Inspection

  isEmpty(): boolean {
    return this.steps.length === 0;
  }

  clear(): this {
    this.steps = [];
    return this;
  }

  /** Commands that will be sent, in order, without expect/send markup. */
  previewSteps(): string[] {
    return this.steps.map((step) => step.commandText);
  }

  printPreview(write: (line: string) => void = console.log): void {
    write('\nCommand preview:');
    this.previewSteps().forEach((command, index) => write(`${index + 1}. ${command}`));
  }

  /** Throws `INVALID_CONFIG` when no site is known. */
  renderScript(options: RenderOptions = {}): string {
    const site = this.requireSite();
    const password = options.redact ? REDACTED : this.credentials.password;
    const authSteps = [
      new Step(this.passwordPrompt, password),
      new Step(this.mfaPrompt, this.mfaOption)
    ];

    return (
      'expect << !\n' +
      `set timeout ${this.expectTimeout}\n` +
      `spawn ${this.mode} ${this.credentials.username}@${site}\n` +
      renderSteps(authSteps) +
      renderSteps(this.steps) +
      'expect eof\n!\n'
    );
  }

  /**
   * Appends the exit command and runs the whole script. Calling this twice
   * runs the steps twice and leaves two exit commands in the list.
   */
  run(): void {
    const site = this.requireSite();
    this.addStep(this.exitCommand);
    this.logger.info(`Running ${this.steps.length} steps against ${site} over ${this.mode}`);
    this.executor.execute(this.renderScript());
  }

  // Credential maintenance

  async resetUsername(): Promise<void> {
    this.credentials = await this.requireStore().resetUsername();
  }

  async resetPassword(): Promise<void> {
    this.credentials = await this.requireStore().resetPassword();
  }

  private requireStore(): CredentialStore {
    if (!this.store) {
      throw ErrorFactory.noCredentialStore();
    }
    return this.store;
  }

  private requireSite(): string {
    if (!this.site) {
      throw ErrorFactory.missingSite();
    }
    return this.site;
  }

  private checkTransfer(kind: TransferKind, file: string): void {
    if (this.mode !== 'sftp') {
      throw ErrorFactory.unsupportedOperation(kind, this.mode);
    }
    if (kind !== 'get' && kind !== 'put') {
      throw ErrorFactory.invalidArgument('kind', kind, "Use 'get' or 'put'.");
    }
    if (!file) {
      throw ErrorFactory.invalidArgument('file', file, 'A file to transfer is required.');
    }
  }

  /** Group and mode as they will be sent; sftp only takes numeric values. */
  private permissionValues(
    group?: string | number,
    mode: string | number = '0664'
  ): { effectiveGroup?: string; octal: string } {
    const effectiveGroup = group !== undefined && group !== '' ? String(group) : this.group;
    const octal = String(mode);

    if (this.mode === 'sftp') {
      this.requireNumeric('group', effectiveGroup);
      this.requireNumeric('mode', octal);
    }
    return { effectiveGroup, octal };
  }

  private requireNumeric(name: string, value: string | undefined): void {
    if (value && !/^\d+$/.test(value)) {
      throw ErrorFactory.invalidArgument(name, value, 'Numeric values must be used over sftp.');
    }
  }
}

export { Step, renderSteps } from './step.js';
export type { QuoteStyle } from './step.js';
export {
  CredentialStore,
  completeCredentials,
  formatCredentials,
  parseCredentials,
  resolveConfigPath
} from './credential-store.js';
export { ErrorCode, ErrorFactory, ScripterError } from './errors.js';
export { TerminalPrompter } from './prompter.js';
export { ShellScriptExecutor } from './script-executor.js';
export * from './types.js';
