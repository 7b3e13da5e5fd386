#!/usr/bin/env node
/**
 * technitium-reconcile CLI - Desired-state management for Technitium DNS Server
 *
 * One subcommand per resource kind, each reconciling a single resource:
 * - zone, record, user, group, blocked, allowed, app-config
 * - apply: reconcile every resource in a manifest
 * - flush: flush the DNS cache or the blocked/allowed zones
 */

import { Argument, Command, Option } from 'commander';
import type { GlobalOptions, CommandContext, CommandResult } from './types.js';
import {
  createContext,
  reconcileCommand,
  applyCommand,
  parseConcurrency,
  flushCommand,
  zoneEntry,
  recordEntry,
  userEntry,
  groupEntry,
  domainEntry,
  appConfigEntry,
  type CliFlags,
} from './commands/index.js';
import { printResult, error } from './utils/output.js';
import { formatError } from './api/errors.js';
import { ProfileResolutionError } from './config/index.js';
import { ZONE_TYPES } from './reconcilers/zone.js';
import { RECORD_TYPES } from './reconcilers/record.js';
import { FLUSH_TARGETS } from './actions/flush.js';

const VERSION = '0.1.0';

/**
 * Main CLI program
 */
const program = new Command()
  .name('technitium-reconcile')
  .description('Idempotent desired-state management for Technitium DNS Server')
  .version(VERSION)
  // Global options available to all commands
  .addOption(new Option('--api-url <url>', 'Server base URL (e.g. https://dns.example.com)'))
  .addOption(new Option('--api-port <port>', 'Server API port (default: 5380)'))
  .addOption(new Option('--api-token <token>', 'API token'))
  .addOption(new Option('--no-validate-certs', 'Skip TLS certificate validation'))
  .addOption(new Option('--config <path>', 'Config file (default: ./technitium.yaml)'))
  .addOption(
    new Option('--dry-run', 'Show what would happen without making changes')
      .default(false)
  )
  .addOption(new Option('--check', 'Alias for --dry-run').default(false))
  .addOption(
    new Option('--json', 'Output JSON for CI/automation')
      .default(false)
  )
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  );

function globalOptions(): GlobalOptions {
  const opts = program.opts<GlobalOptions>();
  return { ...opts, dryRun: opts.dryRun || opts.check === true };
}

/**
 * Resolve the context, run a command, print and exit
 */
async function execute<T>(
  label: string,
  run: (ctx: CommandContext) => Promise<CommandResult<T>>
): Promise<void> {
  try {
    const ctx = createContext(globalOptions());
    const result = await run(ctx);
    if (ctx.outputFormat === 'json') {
      printResult(result, ctx.outputFormat);
    }
    process.exit(result.success ? 0 : 1);
  } catch (err) {
    const message = err instanceof ProfileResolutionError ? err.toUserMessage() : formatError(err);
    if (globalOptions().json) {
      printResult({ success: false, message, errors: [message] }, 'json');
    } else {
      error(`${label} failed: ${message}`);
    }
    process.exit(1);
  }
}

function stateOption(): Option {
  return new Option('--state <state>', 'Desired state')
    .choices(['present', 'absent'])
    .default('present');
}

/**
 * zone command
 */
program
  .command('zone')
  .description('Ensure a zone exists or is absent')
  .argument('<zone>', 'Zone name (e.g. example.com)')
  .addOption(stateOption())
  .addOption(new Option('--type <type>', 'Zone type (default: Primary)').choices(ZONE_TYPES))
  .option('--enabled', 'Zone should be enabled')
  .option('--no-enabled', 'Zone should be disabled (existing zones only)')
  .option('--catalog <zone>', 'Catalog zone to register with')
  .option('--use-soa-serial-date-scheme', 'Use the date scheme for SOA serials')
  .option('--primary-name-server-addresses <list>', 'Comma-separated primary name servers')
  .option('--zone-transfer-protocol <protocol>', 'Tcp, Tls or Quic')
  .option('--tsig-key-name <name>', 'TSIG key for zone transfers')
  .option('--validate-zone', 'Validate the zone with ZONEMD')
  .option('--initialize-forwarder', 'Create the initial FWD record')
  .option('--protocol <protocol>', 'Forwarder protocol: Udp, Tcp, Tls, Https or Quic')
  .option('--forwarder <address>', 'Forwarder address')
  .option('--dnssec-validation', 'Enable DNSSEC validation for the forwarder')
  .option('--proxy-type <type>', 'NoProxy, DefaultProxy, Http or Socks5')
  .option('--proxy-address <address>', 'Proxy address')
  .option('--proxy-port <port>', 'Proxy port')
  .option('--proxy-username <name>', 'Proxy username')
  .option('--proxy-password <password>', 'Proxy password')
  .action(async (zone: string, cmdOpts: CliFlags) => {
    await execute('Zone', (ctx) => reconcileCommand(ctx, { entry: zoneEntry(zone, cmdOpts) }));
  });

/**
 * record command
 */
program
  .command('record')
  .description('Ensure a single DNS record exists or is absent')
  .argument('<name>', 'Record owner name (e.g. www.example.com)')
  .addOption(stateOption())
  .addOption(new Option('--type <type>', 'Record type').choices(RECORD_TYPES).makeOptionMandatory())
  .requiredOption('--value <value>', 'Record value (address, target name, text or CAA value)')
  .option('--preference <n>', 'MX preference')
  .option('--priority <n>', 'SRV priority')
  .option('--weight <n>', 'SRV weight')
  .option('--port <n>', 'SRV port')
  .option('--flags <n>', 'CAA flags')
  .option('--tag <tag>', 'CAA tag (issue, issuewild, iodef)')
  .option('--zone <zone>', 'Zone that holds the record (default: inferred by the server)')
  .option('--ttl <seconds>', 'Record TTL')
  .option('--comments <text>', 'Record comments')
  .action(async (name: string, cmdOpts: CliFlags) => {
    await execute('Record', (ctx) => reconcileCommand(ctx, { entry: recordEntry(name, cmdOpts) }));
  });

/**
 * user command
 */
program
  .command('user')
  .description('Ensure a user account exists or is absent')
  .argument('<username>', 'Username')
  .addOption(stateOption())
  .option('--password <password>', 'Password (required on create, never updated)')
  .option('--display-name <name>', 'Display name')
  .option('--disabled', 'Account should be disabled (existing users only)')
  .option('--no-disabled', 'Account should be enabled')
  .action(async (username: string, cmdOpts: CliFlags) => {
    await execute('User', (ctx) => reconcileCommand(ctx, { entry: userEntry(username, cmdOpts) }));
  });

/**
 * group command
 */
program
  .command('group')
  .description('Ensure a group exists or is absent')
  .argument('<name>', 'Group name')
  .addOption(stateOption())
  .option('--description <text>', 'Group description')
  .option('--members <list>', 'Comma-separated usernames; replaces the member list of an existing group')
  .action(async (name: string, cmdOpts: CliFlags) => {
    await execute('Group', (ctx) => reconcileCommand(ctx, { entry: groupEntry(name, cmdOpts) }));
  });

/**
 * blocked / allowed commands
 */
program
  .command('blocked')
  .description('Ensure a domain is on the blocked list, or not')
  .argument('<domain>', 'Domain name')
  .addOption(stateOption())
  .action(async (domain: string, cmdOpts: CliFlags) => {
    await execute('Blocked domain', (ctx) =>
      reconcileCommand(ctx, { entry: domainEntry('blocked-domain', domain, cmdOpts) })
    );
  });

program
  .command('allowed')
  .description('Ensure a domain is on the allowed list, or not')
  .argument('<domain>', 'Domain name')
  .addOption(stateOption())
  .action(async (domain: string, cmdOpts: CliFlags) => {
    await execute('Allowed domain', (ctx) =>
      reconcileCommand(ctx, { entry: domainEntry('allowed-domain', domain, cmdOpts) })
    );
  });

/**
 * app-config command
 */
program
  .command('app-config')
  .description('Ensure an installed DNS app has the given configuration')
  .argument('<app>', 'App name as installed on the server')
  .addOption(
    new Option('--config-text <text>', 'Configuration text').conflicts('configFile')
  )
  .option('--config-file <path>', 'Read the configuration from a file')
  .addOption(
    new Option('--format <format>', 'Compare as exact text or as JSON')
      .choices(['text', 'json'])
  )
  .action(async (app: string, cmdOpts: CliFlags) => {
    await execute('App config', (ctx) =>
      reconcileCommand(ctx, { entry: appConfigEntry(app, cmdOpts) })
    );
  });

/**
 * flush command
 */
program
  .command('flush')
  .description('Flush the DNS cache or the blocked/allowed zones')
  .addArgument(new Argument('<target>', 'What to flush').choices(FLUSH_TARGETS))
  .action(async (target: string) => {
    await execute('Flush', (ctx) => flushCommand(ctx, { target }));
  });

/**
 * apply command
 */
program
  .command('apply')
  .description('Reconcile every resource in a manifest file')
  .requiredOption('-f, --file <path>', 'Manifest file (YAML or JSON)')
  .option('--concurrency <n>', 'Resources reconciled in parallel', parseConcurrency, 1)
  .option('--fail-fast', 'Stop on first failure')
  .action(async (cmdOpts: { file: string; concurrency: number; failFast?: boolean }) => {
    await execute('Apply', (ctx) =>
      applyCommand(ctx, {
        file: cmdOpts.file,
        concurrency: cmdOpts.concurrency,
        failFast: cmdOpts.failFast,
      })
    );
  });

// Parse and execute
await program.parseAsync();
