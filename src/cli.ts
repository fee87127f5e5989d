/**
 * Command line handling: argument parsing, actions and the run sequence.
 */

import { Scripter } from './scripter.js';
import { ErrorFactory } from './errors.js';
import { TerminalPrompter } from './prompter.js';
import { ConnectionMode, isConnectionMode } from './types.js';

export const VERSION = '0.1.0';

export const ACTIONS = [
  'ls',
  'pwd',
  'cd',
  'get',
  'put',
  'chmod',
  'exec',
  'reset-username',
  'reset-password'
] as const;
export type Action = (typeof ACTIONS)[number];

function isAction(value: string): value is Action {
  const known: readonly string[] = ACTIONS;
  return known.includes(value);
}

export interface CliArguments {
  version: boolean;
  help: boolean;
  preview: boolean;
  printScript: boolean;
  headless: boolean;
  local: boolean;
  setPermissions: boolean;
  mode?: ConnectionMode;
  site?: string;
  config?: string;
  group?: string;
  name?: string;
  flags?: string;
  action?: Action;
  actionArgs: string[];
}

// CLI argument parsing
export function parseArguments(argv: string[]): CliArguments {
  const result: CliArguments = {
    version: false,
    help: false,
    preview: false,
    printScript: false,
    headless: false,
    local: false,
    setPermissions: false,
    actionArgs: []
  };
  const positional: string[] = [];

  const valueOf = (option: string, index: number): string => {
    const value = argv[index];
    if (value === undefined || value.startsWith('--')) {
      throw ErrorFactory.invalidConfig(option, value);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    // everything after the action belongs to it
    if (positional.length > 0) {
      positional.push(arg);
      continue;
    }

    switch (arg) {
      case '--version':
      case '-v':
        result.version = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      case '--preview':
        result.preview = true;
        break;
      case '--print-script':
        result.printScript = true;
        break;
      case '--headless':
        result.headless = true;
        break;
      case '--local':
        result.local = true;
        break;
      case '--set-permissions':
        result.setPermissions = true;
        break;
      case '--mode': {
        const mode = valueOf(arg, ++i).toLowerCase();
        if (!isConnectionMode(mode)) {
          throw ErrorFactory.invalidConfig('--mode', mode);
        }
        result.mode = mode;
        break;
      }
      case '--site':
        result.site = valueOf(arg, ++i);
        break;
      case '--config':
        result.config = valueOf(arg, ++i);
        break;
      case '--group':
        result.group = valueOf(arg, ++i);
        break;
      case '--name':
        result.name = valueOf(arg, ++i);
        break;
      case '--flags':
        result.flags = valueOf(arg, ++i);
        break;
      default:
        if (arg.startsWith('-')) {
          throw ErrorFactory.invalidConfig('option', arg);
        }
        positional.push(arg);
    }
  }

  const [action, ...actionArgs] = positional;
  if (action !== undefined) {
    if (!isAction(action)) {
      throw ErrorFactory.invalidConfig('action', action);
    }
    result.action = action;
    result.actionArgs = actionArgs;
  }

  return result;
}

function requireArg(args: CliArguments, index: number, name: string): string {
  const value = args.actionArgs[index];
  if (!value) {
    throw ErrorFactory.invalidArgument(name, value, `'${args.action}' needs a ${name}.`);
  }
  return value;
}

/**
 * Adds the steps for one CLI action. The reset actions touch only the
 * credentials file and are handled by the caller.
 */
export function applyAction(scripter: Scripter, args: CliArguments): void {
  const flags = args.flags ? args.flags.replace(/^-/, '').split('') : [];

  switch (args.action) {
    case 'ls':
      scripter.list(args.actionArgs[0]);
      break;
    case 'pwd':
      scripter.pwd();
      break;
    case 'cd':
      scripter.changeDirectory(requireArg(args, 0, 'directory'), args.local);
      break;
    case 'get':
      scripter.get(requireArg(args, 0, 'file'), {
        outdir: args.actionArgs[1],
        newName: args.name,
        options: flags
      });
      break;
    case 'put':
      scripter.put(requireArg(args, 0, 'file'), {
        outdir: args.actionArgs[1],
        newName: args.name,
        options: flags,
        setPermissions: args.setPermissions
      });
      break;
    case 'chmod': {
      const mode = requireArg(args, 0, 'mode');
      requireArg(args, 1, 'file');
      scripter.setPermissions(args.actionArgs.slice(1), args.group, mode);
      break;
    }
    case 'exec':
      requireArg(args, 0, 'command');
      scripter.addStep(args.actionArgs.join(' '));
      break;
    default:
      break;
  }
}

// Print help information
function printHelp(): void {
  console.log('cluster-scripter - scripted sftp/ssh sessions through expect');
  console.log('');
  console.log('Usage: cluster-scripter [options] <action> [args...]');
  console.log('');
  console.log('Actions:');
  console.log('  ls [path]                List a remote directory (default: .)');
  console.log('  pwd                      Print the remote working directory');
  console.log('  cd <dir>                 Change directory (--local for lcd, sftp only)');
  console.log('  get <file> [outdir]      Download a file, optionally into a local directory');
  console.log('  put <file> [outdir]      Upload a file, optionally into a remote directory');
  console.log('  chmod <mode> <file...>   Set permissions (and group with --group)');
  console.log('  exec <command...>        Send a raw command');
  console.log('  reset-username           Ask for a new username and save it');
  console.log('  reset-password           Ask for a new password and save it');
  console.log('');
  console.log('Options:');
  console.log('  -h, --help               Show this help message');
  console.log('  -v, --version            Show version information');
  console.log('  --mode <sftp|ssh>        Connection mode (default: sftp)');
  console.log('  --site <host>            Remote site to reach');
  console.log('  --config <path>          Credentials file (default: ~/.cluster-scripter/config.txt)');
  console.log('  --group <group>          Group for permission changes');
  console.log('  --name <name>            Rename the transferred file');
  console.log('  --flags <letters>        Options for get/put, e.g. --flags rp');
  console.log('  --set-permissions        Fix permissions after put');
  console.log('  --local                  Make cd change the local directory');
  console.log('  --headless               Never prompt; fail if credentials are missing');
  console.log('  --preview                Show the commands without running them');
  console.log('  --print-script           Show the expect script (password hidden) without running it');
  console.log('');
  console.log('Environment Variables:');
  console.log('  CLUSTER_SCRIPTER_CONFIG      Credentials file path');
  console.log('  CLUSTER_SCRIPTER_SITE        Default remote site');
  console.log('  CLUSTER_SCRIPTER_MODE        Default connection mode');
  console.log('  CLUSTER_SCRIPTER_LOG_LEVEL   Log level (default: info)');
  console.log('  CLUSTER_SCRIPTER_LOG_FILE    Log file path (optional)');
}

// Main application entry point
export async function main(argv: string[]): Promise<void> {
  const args = parseArguments(argv);

  if (args.version) {
    console.log(`cluster-scripter v${VERSION}`);
    return;
  }

  if (args.help || !args.action) {
    printHelp();
    return;
  }

  // stdin belongs to the spawned session once the credentials are settled
  const prompter = new TerminalPrompter();
  let scripter: Scripter;
  try {
    scripter = await Scripter.create({
      mode: args.mode,
      site: args.site,
      group: args.group,
      configPath: args.config,
      headless: args.headless || undefined,
      prompter
    });

    if (args.action === 'reset-username') {
      await scripter.resetUsername();
      return;
    }
    if (args.action === 'reset-password') {
      await scripter.resetPassword();
      return;
    }
  } finally {
    prompter.close();
  }

  applyAction(scripter, args);

  if (args.preview) {
    scripter.printPreview();
    return;
  }

  if (args.printScript) {
    scripter.addStep(scripter.exitCommand);
    console.log(scripter.renderScript({ redact: true }));
    return;
  }

  scripter.run();
}
