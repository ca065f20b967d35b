export type Command =
  | { name: 'discover' }
  | { name: 'read'; uuid: string }
  | { name: 'write'; uuid: string; data: Buffer; withResponse: boolean }
  | { name: 'measure' }
  | { name: 'battery' }
  | { name: 'info' }
  | { name: 'features' };

export type CommandName = Command['name'];

export interface CliArgs {
  configPath?: string;
  help: boolean;
  debug: boolean;
  /** Print the measurement record as JSON instead of a summary. */
  json: boolean;
  device?: string;
  command?: Command;
}

export const USAGE = `
cardio-ble: talk to Qardio devices over Bluetooth LE

Usage:
  cardio-ble [options] <device> <command> [args]

Commands:
  discover                  List services and characteristics
  read <uuid>               Read a characteristic, print hex
  write <uuid> <hex>        Write bytes to a characteristic
  measure                   Run a blood-pressure measurement
  battery                   Print the battery level
  info                      Print Device Information fields
  features                  Print the device's feature map

Options:
  -c, --config <path>       Config file (default: ./cardio-ble.yaml,
                            then ~/.config/cardio-ble/config.yaml)
  --no-response             With 'write': write without response
  --json                    With 'measure': print the record as JSON
  --debug                   Verbose logging
  -h, --help                Show this help

<device> is a key under 'devices:' in the config file.
`;

/** Parse "f101", "f1 01", "f1:01" or "0xf101" into bytes. */
export function parseHex(raw: string): Buffer {
  const cleaned = raw
    .trim()
    .replace(/^0x/i, '')
    .replace(/[\s:-]/g, '');
  if (cleaned.length === 0 || cleaned.length % 2 !== 0 || !/^[0-9a-f]+$/i.test(cleaned)) {
    throw new Error(`Invalid hex payload '${raw}'`);
  }
  return Buffer.from(cleaned, 'hex');
}

function requireOperand(operands: string[], index: number, what: string, command: string): string {
  const value = operands[index];
  if (!value) throw new Error(`'${command}' needs ${what}`);
  return value;
}

function toCommand(name: string, operands: string[], withResponse: boolean): Command {
  switch (name) {
    case 'discover':
    case 'measure':
    case 'battery':
    case 'info':
    case 'features':
      return { name };
    case 'read':
      return { name, uuid: requireOperand(operands, 0, 'a characteristic UUID', name) };
    case 'write':
      return {
        name,
        uuid: requireOperand(operands, 0, 'a characteristic UUID', name),
        data: parseHex(requireOperand(operands, 1, 'a hex payload', name)),
        withResponse,
      };
    default:
      throw new Error(`Unknown command '${name}'. Run with --help for the list of commands.`);
  }
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { help: false, debug: false, json: false };
  const positional: string[] = [];
  let withResponse = true;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--config' || arg === '-c') {
      const path = argv[++i];
      if (!path) throw new Error(`${arg} needs a file path`);
      args.configPath = path;
    } else if (arg === '--debug') {
      args.debug = true;
    } else if (arg === '--json') {
      args.json = true;
    } else if (arg === '--no-response') {
      withResponse = false;
    } else if (arg.startsWith('-') && arg.length > 1) {
      throw new Error(`Unknown option '${arg}'`);
    } else {
      positional.push(arg);
    }
  }

  if (args.help) return args;

  const [device, command, ...operands] = positional;
  args.device = device;
  if (command) args.command = toCommand(command, operands, withResponse);
  return args;
}
