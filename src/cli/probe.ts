import { CliError, RelayClient, statusText, type SendOptions } from './client.js';
import type { FetchLike } from '../auth/keys.js';

export interface ProbeIo {
  out: (line: string) => void;
  fetchImpl?: FetchLike;
  env?: NodeJS.ProcessEnv;
}

export const getFlag = (args: string[], name: string, fallback = '') => {
  const prefixed = `--${name}=`;
  const direct = args.find((arg) => arg.startsWith(prefixed));
  if (direct) return direct.slice(prefixed.length);

  const index = args.findIndex((arg) => arg === `--${name}`);
  if (index >= 0 && args[index + 1]) {
    return args[index + 1];
  }

  return fallback;
};

const VALUE_FLAGS = new Set(['url', 'token', 'api-key', 'context', 'task', 'history']);

/** Positional arguments with every `--flag value` pair removed. */
export const positionals = (args: string[]) => {
  const output: string[] = [];
  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];
    if (arg.startsWith('--')) {
      const name = arg.slice(2);
      if (VALUE_FLAGS.has(name)) index += 1;
      continue;
    }
    output.push(arg);
  }
  return output;
};

const helpText = [
  'a2a-relay-probe',
  '',
  'Commands:',
  '  card',
  '  send <text> [--context <id>] [--task <id>] [--no-wait]',
  '  stream <text> [--context <id>] [--task <id>]',
  '  get <taskId> [--history <n>]',
  '  cancel <taskId>',
  '',
  'Flags:',
  '  --url <base url>       default http://localhost:8000 (or RELAY_URL)',
  '  --token <access token> sent as Authorization: Bearer (or RELAY_TOKEN)',
  '  --api-key <key>        sent as X-API-Key (or RELAY_API_KEY)',
  '',
  'Examples:',
  '  a2a-relay-probe card --url https://agent.example.test',
  '  a2a-relay-probe send "hello" --api-key test-secret',
];

export const runProbe = async (argv: string[], io: ProbeIo) => {
  const env = io.env ?? process.env;
  const command = argv[0] || 'help';
  const args = argv.slice(1);
  const json = (value: unknown) => io.out(JSON.stringify(value, null, 2));

  if (command === 'help' || command === '--help' || command === '-h') {
    for (const line of helpText) io.out(line);
    return;
  }

  const client = new RelayClient({
    baseUrl: getFlag(args, 'url', env.RELAY_URL || 'http://localhost:8000'),
    token: getFlag(args, 'token', env.RELAY_TOKEN || '') || undefined,
    apiKey: getFlag(args, 'api-key', env.RELAY_API_KEY || '') || undefined,
    fetchImpl: io.fetchImpl,
  });
  const text = positionals(args).join(' ');
  const sendOptions: SendOptions = {
    contextId: getFlag(args, 'context') || undefined,
    taskId: getFlag(args, 'task') || undefined,
    blocking: !args.includes('--no-wait'),
  };

  if (command === 'card') {
    json(await client.fetchCard());
    return;
  }

  if (command === 'send') {
    if (!text) throw new CliError('send requires message text', 'Use: send <text>');
    const task = await client.send(text, sendOptions);
    io.out(`task ${task.id} context ${task.contextId}: ${task.status.state}`);
    const reply = statusText(task.status);
    if (reply) io.out(reply);
    return;
  }

  if (command === 'stream') {
    if (!text) throw new CliError('stream requires message text', 'Use: stream <text>');
    for await (const update of client.stream(text, sendOptions)) {
      const reply = statusText(update.status);
      io.out(`[${update.status.state}]${reply ? ` ${reply}` : ''}`);
    }
    return;
  }

  if (command === 'get') {
    const [taskId] = positionals(args);
    if (!taskId) throw new CliError('get requires a task id', 'Use: get <taskId>');
    const history = getFlag(args, 'history');
    const historyLength = history ? Number(history) : undefined;
    if (historyLength !== undefined && (!Number.isInteger(historyLength) || historyLength < 0)) {
      throw new CliError(`invalid --history value: ${history}`);
    }
    json(await client.getTask(taskId, historyLength));
    return;
  }

  if (command === 'cancel') {
    const [taskId] = positionals(args);
    if (!taskId) throw new CliError('cancel requires a task id', 'Use: cancel <taskId>');
    json(await client.cancelTask(taskId));
    return;
  }

  throw new CliError(`unknown command: ${command}`, 'Use `a2a-relay-probe --help` to list commands.');
};
