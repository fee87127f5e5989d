import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ErrorCode, ScripterError } from '../errors.js';
import { Scripter } from '../scripter.js';
import { Credentials, ScripterOptions } from '../types.js';
import { RecordingExecutor, ScriptedPrompter, captureAsyncError, captureError } from './helpers/fakes.js';

const credentials: Credentials = {
  username: 'alice',
  password: 'test-secret',
  site: 'cluster.example.edu'
};

function makeScripter(options: ScripterOptions = {}): { scripter: Scripter; executor: RecordingExecutor } {
  const executor = new RecordingExecutor();
  const scripter = new Scripter(credentials, {
    mode: 'sftp',
    passwordPrompt: 'Password:',
    mfaPrompt: 'Passcode or option (1-3):',
    mfaOption: '1',
    expectTimeout: -1,
    executor,
    ...options
  });
  return { scripter, executor };
}

function errorCode(error: unknown): ErrorCode | undefined {
  return error instanceof ScripterError ? error.code : undefined;
}

describe('Scripter step building', () => {
  test('should preview one command per step in the order they were added', () => {
    const { scripter } = makeScripter();

    scripter.addStep('pwd');
    scripter.list();
    scripter.changeDirectory('data');

    expect(scripter.previewSteps()).toEqual(['pwd', 'ls -la .', 'cd data']);
  });

  test('should wait for the sftp prompt by default and the username over ssh', () => {
    expect(makeScripter().scripter.defaultPrompt).toBe('sftp>');
    expect(makeScripter({ mode: 'ssh' }).scripter.defaultPrompt).toBe('alice');
  });

  test('should let a step override the expected prompt', () => {
    const { scripter } = makeScripter();

    scripter.addStep('y', 'Overwrite? (y/n)');

    expect(scripter.renderScript()).toContain('expect "Overwrite? (y/n)"\nsend "y\\n"\n');
  });

  test('should join only the non-empty parts of a basic step', () => {
    const { scripter } = makeScripter();

    scripter.basicStep('chmod', undefined, '', null, 644, 'notes.txt');
    scripter.basicStep();
    scripter.basicStep(undefined, '');

    expect(scripter.previewSteps()).toEqual(['chmod 644 notes.txt']);
  });

  test('should list the given directory', () => {
    const { scripter } = makeScripter();

    scripter.list('results');
    scripter.pwd();

    expect(scripter.previewSteps()).toEqual(['ls -la results', 'pwd']);
  });

  test('should change the local directory only over sftp', () => {
    const { scripter } = makeScripter();
    scripter.changeDirectory('downloads', true);
    expect(scripter.previewSteps()).toEqual(['lcd downloads']);

    const { scripter: ssh } = makeScripter({ mode: 'ssh' });
    const error = captureError(() => ssh.changeDirectory('downloads', true));
    expect(errorCode(error)).toBe(ErrorCode.UNSUPPORTED_OPERATION);
    expect(ssh.isEmpty()).toBe(true);
  });

  test('should allow a remote directory change over ssh', () => {
    const { scripter } = makeScripter({ mode: 'ssh' });

    scripter.changeDirectory('/scratch/alice');

    expect(scripter.previewSteps()).toEqual(['cd /scratch/alice']);
  });

  test('should report emptiness and clear all steps', () => {
    const { scripter } = makeScripter();
    expect(scripter.isEmpty()).toBe(true);

    scripter.pwd().list().put('data.csv', { outdir: 'remote/dir' });
    expect(scripter.isEmpty()).toBe(false);

    scripter.clear();
    expect(scripter.previewSteps()).toEqual([]);
    expect(scripter.isEmpty()).toBe(true);
  });
});

describe('Scripter transfers', () => {
  test('should create and enter the remote directory before a put', () => {
    const { scripter } = makeScripter();

    scripter.put('data.csv', { outdir: 'remote/dir' });

    expect(scripter.previewSteps()).toEqual(['mkdir remote/dir', 'cd remote/dir', 'put data.csv']);
  });

  test('should put into the current directory when no outdir is given', () => {
    const { scripter } = makeScripter();

    scripter.put('test_dir/*');

    expect(scripter.previewSteps()).toEqual(['put test_dir/*']);
  });

  test('should enter the local directory before a get and pass flags and rename', () => {
    const { scripter } = makeScripter();

    scripter.get('results.txt', { outdir: 'local', newName: 'copy.txt', options: ['r', 'p'] });

    expect(scripter.previewSteps()).toEqual(['lcd local', 'get -rp results.txt copy.txt']);
  });

  test('should fix permissions on the uploaded file when asked', () => {
    const { scripter } = makeScripter({ group: 1234 });

    scripter.put('out/data.csv', { outdir: 'remote', setPermissions: true });

    expect(scripter.previewSteps()).toEqual([
      'mkdir remote',
      'cd remote',
      'put out/data.csv',
      'chmod 0664 data.csv',
      'chgrp 1234 data.csv'
    ]);
  });

  test('should fix permissions on the new name after a renaming put', () => {
    const { scripter } = makeScripter();

    scripter.put('a.csv', { newName: 'b.csv', setPermissions: true });

    expect(scripter.previewSteps()).toEqual(['put a.csv b.csv', 'chmod 0664 b.csv']);
  });

  test('should run transfers through the generic transfer builder', () => {
    const { scripter } = makeScripter();

    scripter.transfer('put', 'a.txt', false, { outdir: 'remote' });

    expect(scripter.previewSteps()).toEqual(['cd remote', 'put a.txt']);
  });

  test('should refuse every transfer outside sftp mode', () => {
    const { scripter } = makeScripter({ mode: 'ssh' });

    expect(errorCode(captureError(() => scripter.get('a.txt')))).toBe(ErrorCode.UNSUPPORTED_OPERATION);
    expect(errorCode(captureError(() => scripter.put('a.txt', { outdir: 'remote' })))).toBe(
      ErrorCode.UNSUPPORTED_OPERATION
    );
    expect(errorCode(captureError(() => scripter.transfer('get', 'a.txt', true)))).toBe(
      ErrorCode.UNSUPPORTED_OPERATION
    );
    expect(scripter.isEmpty()).toBe(true);
  });

  test('should reject a transfer without a file', () => {
    const { scripter } = makeScripter();

    expect(errorCode(captureError(() => scripter.get('')))).toBe(ErrorCode.INVALID_ARGUMENT);
  });

  test('should add nothing when a put without a file is rejected', () => {
    const { scripter } = makeScripter();
    scripter.pwd();

    expect(errorCode(captureError(() => scripter.put('', { outdir: 'remote' })))).toBe(ErrorCode.INVALID_ARGUMENT);
    expect(scripter.previewSteps()).toEqual(['pwd']);
  });

  test('should add nothing when a put cannot fix permissions over sftp', () => {
    const { scripter } = makeScripter({ group: 'staff' });

    const error = captureError(() => scripter.put('x.csv', { outdir: 'remote', setPermissions: true }));

    expect(errorCode(error)).toBe(ErrorCode.INVALID_ARGUMENT);
    expect(scripter.previewSteps()).toEqual([]);
  });
});

describe('Scripter permissions', () => {
  test('should change mode and group of every path', () => {
    const { scripter } = makeScripter();

    scripter.setPermissions(['a.txt', 'b.txt'], '1001', '0640');

    expect(scripter.previewSteps()).toEqual([
      'chmod 0640 a.txt',
      'chgrp 1001 a.txt',
      'chmod 0640 b.txt',
      'chgrp 1001 b.txt'
    ]);
  });

  test('should accept integer group and mode values', () => {
    const { scripter } = makeScripter();

    scripter.setPermissions(['a.txt'], 1234, 664);

    expect(scripter.previewSteps()).toEqual(['chmod 664 a.txt', 'chgrp 1234 a.txt']);
  });

  test('should skip the group change when no group is known', () => {
    const { scripter } = makeScripter();

    scripter.setPermissions(['a.txt']);

    expect(scripter.previewSteps()).toEqual(['chmod 0664 a.txt']);
  });

  test('should fall back to the session group', () => {
    const { scripter } = makeScripter({ group: '4321' });

    scripter.setPermissions(['a.txt']);

    expect(scripter.previewSteps()).toEqual(['chmod 0664 a.txt', 'chgrp 4321 a.txt']);
  });

  test('should reject non-numeric group or mode over sftp', () => {
    const { scripter } = makeScripter();

    const groupError = captureError(() => scripter.setPermissions(['a.txt'], 'staff'));
    expect(errorCode(groupError)).toBe(ErrorCode.INVALID_ARGUMENT);
    expect(groupError instanceof Error && groupError.message).toBe(
      'Invalid input (staff, type: string) for group. Numeric values must be used over sftp.'
    );

    expect(errorCode(captureError(() => scripter.setPermissions(['a.txt'], 1234, 'u+rw')))).toBe(
      ErrorCode.INVALID_ARGUMENT
    );
    expect(errorCode(captureError(() => scripter.setPermissions(['a.txt'], 1.5)))).toBe(
      ErrorCode.INVALID_ARGUMENT
    );
    expect(scripter.isEmpty()).toBe(true);
  });

  test('should reject a non-numeric session group over sftp', () => {
    const { scripter } = makeScripter({ group: 'staff' });

    expect(errorCode(captureError(() => scripter.setPermissions(['a.txt'])))).toBe(ErrorCode.INVALID_ARGUMENT);
  });

  test('should accept symbolic values over ssh', () => {
    const { scripter } = makeScripter({ mode: 'ssh' });

    scripter.setPermissions(['a.txt'], 'staff', 'u+rw');

    expect(scripter.previewSteps()).toEqual(['chmod u+rw a.txt', 'chgrp staff a.txt']);
  });
});

describe('Scripter script rendering', () => {
  test('should render login, authentication, steps and closing in order', () => {
    const { scripter } = makeScripter();
    scripter.list('data');

    expect(scripter.renderScript()).toBe(
      'expect << !\n' +
        'set timeout -1\n' +
        'spawn sftp alice@cluster.example.edu\n' +
        'expect "Password:"\n' +
        'send "test-secret\\n"\n' +
        'expect "Passcode or option (1-3):"\n' +
        'send "1\\n"\n' +
        'expect "sftp>"\n' +
        'send "ls -la data\\n"\n' +
        'expect eof\n' +
        '!\n'
    );
  });

  test('should hide the password when redacting', () => {
    const { scripter } = makeScripter();

    const lines = scripter.renderScript({ redact: true }).split('\n');

    expect(lines[4]).toBe('send "********\\n"');
  });

  test('should use the configured site, prompts and timeout', () => {
    const { scripter } = makeScripter({
      mode: 'ssh',
      site: 'login.example.edu',
      mfaPrompt: 'Duo:',
      mfaOption: '2',
      expectTimeout: 30
    });

    const lines = scripter.renderScript().split('\n');

    expect(lines.slice(0, 7)).toEqual([
      'expect << !',
      'set timeout 30',
      'spawn ssh alice@login.example.edu',
      'expect "Password:"',
      'send "test-secret\\n"',
      'expect "Duo:"',
      'send "2\\n"'
    ]);
  });
});

describe('Scripter without a site', () => {
  const login = { username: 'alice', password: 'test-secret' };

  test('should refuse to render a script', () => {
    const scripter = new Scripter(login, { mode: 'sftp', executor: new RecordingExecutor() });

    expect(scripter.site).toBeUndefined();
    expect(errorCode(captureError(() => scripter.renderScript()))).toBe(ErrorCode.INVALID_CONFIG);
  });

  test('should refuse to run and leave the steps alone', () => {
    const executor = new RecordingExecutor();
    const scripter = new Scripter(login, { mode: 'sftp', executor });
    scripter.pwd();

    expect(errorCode(captureError(() => scripter.run()))).toBe(ErrorCode.INVALID_CONFIG);
    expect(scripter.previewSteps()).toEqual(['pwd']);
    expect(executor.scripts).toEqual([]);
  });

  test('should take the site from the options', () => {
    const scripter = new Scripter(login, { mode: 'ssh', site: 'login.example.edu', executor: new RecordingExecutor() });

    expect(scripter.renderScript().split('\n')[2]).toBe('spawn ssh alice@login.example.edu');
  });
});

describe('Scripter run', () => {
  test('should append quit and hand the full script to the executor', () => {
    const { scripter, executor } = makeScripter();
    scripter.pwd();

    scripter.run();

    expect(scripter.previewSteps()).toEqual(['pwd', 'quit']);
    expect(executor.scripts).toEqual([scripter.renderScript()]);
    expect(executor.scripts[0]).toContain('expect "sftp>"\nsend "quit\\n"\nexpect eof\n!\n');
  });

  test('should append exit over ssh', () => {
    const { scripter, executor } = makeScripter({ mode: 'ssh' });

    scripter.run();

    expect(scripter.previewSteps()).toEqual(['exit']);
    expect(executor.scripts[0]).toContain('expect "alice"\nsend "exit\\n"\n');
  });

  test('should append a second exit command when run twice', () => {
    const { scripter, executor } = makeScripter();
    scripter.pwd();

    scripter.run();
    scripter.run();

    expect(scripter.previewSteps()).toEqual(['pwd', 'quit', 'quit']);
    expect(executor.scripts).toHaveLength(2);
  });

  test('should print a numbered preview', () => {
    const { scripter } = makeScripter();
    const lines: string[] = [];
    scripter.pwd().list('data');

    scripter.printPreview((line) => lines.push(line));

    expect(lines).toEqual(['\nCommand preview:', '1. pwd', '2. ls -la data']);
  });
});

describe('Scripter credentials', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'cluster-scripter-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('should read credentials from the config file without prompting', async () => {
    const configPath = join(dir, 'config.txt');
    writeFileSync(configPath, 'username=alice\npassword=secret\n');
    const prompter = new ScriptedPrompter();

    const scripter = await Scripter.create({ configPath, prompter, executor: new RecordingExecutor() });

    expect(scripter.getCredentials()).toEqual({ username: 'alice', password: 'secret' });
    expect(prompter.questions).toEqual([]);
  });

  test('should connect to the site passed in alongside file credentials', async () => {
    const configPath = join(dir, 'config.txt');
    writeFileSync(configPath, 'username=alice\npassword=secret\n');

    const scripter = await Scripter.create({
      configPath,
      site: 'cluster.example.edu',
      prompter: new ScriptedPrompter(),
      executor: new RecordingExecutor()
    });

    expect(scripter.site).toBe('cluster.example.edu');
    expect(scripter.renderScript().split('\n')[2]).toBe('spawn sftp alice@cluster.example.edu');
  });

  test('should fail headless when the config file is missing', async () => {
    const error = await captureAsyncError(() =>
      Scripter.create({
        configPath: join(dir, 'missing.txt'),
        site: 'cluster.example.edu',
        headless: true,
        prompter: new ScriptedPrompter(),
        executor: new RecordingExecutor()
      })
    );

    expect(errorCode(error)).toBe(ErrorCode.MISSING_CREDENTIALS);
  });

  test('should reset the username, rewrite the file and follow it in the ssh prompt', async () => {
    const configPath = join(dir, 'config.txt');
    writeFileSync(configPath, 'username=alice\npassword=secret\n');
    const prompter = new ScriptedPrompter(['bob', 'y']);

    const scripter = await Scripter.create({
      configPath,
      site: 'cluster.example.edu',
      mode: 'ssh',
      prompter,
      executor: new RecordingExecutor()
    });
    await scripter.resetUsername();

    expect(scripter.username).toBe('bob');
    expect(scripter.defaultPrompt).toBe('bob');
    expect(readFileSync(configPath, 'utf8')).toBe(
      'username=bob\npassword=secret\nsite=cluster.example.edu\n'
    );
  });

  test('should reset the password', async () => {
    const configPath = join(dir, 'config.txt');
    writeFileSync(configPath, 'username=alice\npassword=secret\nsite=cluster.example.edu\n');
    const prompter = new ScriptedPrompter([], ['new-secret']);

    const scripter = await Scripter.create({ configPath, prompter, executor: new RecordingExecutor() });
    await scripter.resetPassword();

    expect(scripter.getCredentials().password).toBe('new-secret');
    expect(readFileSync(configPath, 'utf8')).toBe(
      'username=alice\npassword=new-secret\nsite=cluster.example.edu\n'
    );
  });

  test('should refuse a credential reset without a credentials file', async () => {
    const { scripter } = makeScripter();

    const error = await captureAsyncError(() => scripter.resetPassword());

    expect(errorCode(error)).toBe(ErrorCode.INVALID_CONFIG);
  });
});
