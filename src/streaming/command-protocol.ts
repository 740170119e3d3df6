import Ajv, { JSONSchemaType } from 'ajv';
import { ClientCommand } from './types';
import { AppError, unknownCommand } from '../errors/app-error';

interface CommandEnvelope {
  type: string;
}

const ENVELOPE_SCHEMA: JSONSchemaType<CommandEnvelope> = {
  type: 'object',
  properties: {
    type: { type: 'string', minLength: 1, maxLength: 64 },
  },
  required: ['type'],
  additionalProperties: true,
};

const ajv = new Ajv({ allErrors: true });
const validateEnvelope = ajv.compile(ENVELOPE_SCHEMA);

const COMMANDS: Record<ClientCommand['type'], ClientCommand> = {
  ping: { type: 'ping' },
  get_history: { type: 'get_history' },
  stop_streaming: { type: 'stop_streaming' },
};

export type ParsedCommand =
  | { ok: true; command: ClientCommand }
  | { ok: false; error: AppError };

function isCommandType(type: string): type is ClientCommand['type'] {
  return Object.prototype.hasOwnProperty.call(COMMANDS, type);
}

/** Decode one inbound text frame. Anything unrecognised is an UnknownCommand */
export function parseCommand(raw: string): ParsedCommand {
  let message: unknown;
  try {
    message = JSON.parse(raw);
  } catch {
    return { ok: false, error: new AppError('UnknownCommand', 'Messages must be JSON objects with a "type" field') };
  }

  if (!validateEnvelope(message)) {
    return { ok: false, error: new AppError('UnknownCommand', 'Messages must be JSON objects with a "type" field') };
  }

  if (!isCommandType(message.type)) {
    return { ok: false, error: unknownCommand(message.type) };
  }
  return { ok: true, command: COMMANDS[message.type] };
}
