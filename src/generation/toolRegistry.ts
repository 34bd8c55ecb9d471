import { Ajv, SchemaObject, ValidateFunction } from 'ajv';
import { describeError, ToolDispatchError } from '../errors.js';
import { formatSchemaErrors } from '../log/eventSchemas.js';
import type { EventPayloadMap, EventType, JsonObject, JsonValue } from '../log/types.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { parseLenientJson } from '../utils/jsonRepair.js';
import type { ToolDescriptor, ToolOutcome } from './types.js';

const toolsLog = createLogger(NAMESPACES.generation.tools);
const ajv = new Ajv({ allErrors: true, strict: false });

const TOOL_NAME_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

/** Lets a handler record follow-up events; the caller decides where they go. */
export interface ToolContext {
  actor: string | null;
  emit<K extends EventType>(type: K, payload: EventPayloadMap[K]): void;
}

export interface ToolDefinition<A extends JsonObject = JsonObject> {
  name: string;
  description: string;
  /** JSON schema for the arguments object. */
  parameters: SchemaObject;
  handler: (args: A, context: ToolContext) => JsonValue;
}

interface RegisteredTool {
  descriptor: ToolDescriptor;
  run: (args: JsonObject, context: ToolContext) => JsonValue;
}

const NO_OP_CONTEXT: ToolContext = {
  actor: null,
  emit: () => undefined
};

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Accept arguments as an object or as the model's raw JSON text. */
export function parseToolArguments(toolName: string, raw: JsonObject | string): JsonObject {
  if (typeof raw !== 'string') return raw;

  const parsed = parseLenientJson(raw);
  if (parsed === null) {
    throw new ToolDispatchError(`Arguments for ${toolName} are not valid JSON`, toolName, ['parse_failed']);
  }
  if (parsed.repaired) toolsLog(`repaired malformed arguments for ${toolName}`);
  if (!isJsonObject(parsed.value)) {
    throw new ToolDispatchError(`Arguments for ${toolName} must be a JSON object`, toolName, ['not_an_object']);
  }
  return parsed.value;
}

/**
 * Explicit name -> handler registry. Schemas are compiled when a tool is
 * registered, so a bad schema fails at startup rather than mid-session.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  register<A extends JsonObject>(definition: ToolDefinition<A>): this {
    const { name } = definition;
    if (!TOOL_NAME_PATTERN.test(name)) {
      throw new ToolDispatchError(`Invalid tool name "${name}"`, name);
    }
    if (this.tools.has(name)) {
      throw new ToolDispatchError(`Tool ${name} is already registered`, name);
    }

    let validate: ValidateFunction<A>;
    try {
      validate = ajv.compile<A>(definition.parameters);
    } catch (e) {
      throw new ToolDispatchError(`Schema for tool ${name} does not compile: ${describeError(e)}`, name);
    }

    this.tools.set(name, {
      descriptor: { name, description: definition.description, parameters: definition.parameters },
      run: (args, context) => {
        if (!validate(args)) {
          const problems = formatSchemaErrors(validate.errors);
          throw new ToolDispatchError(`Invalid arguments for ${name}: ${problems.join('; ')}`, name, problems);
        }
        return definition.handler(args, context);
      }
    });
    toolsLog(`registered tool ${name}`);
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  describe(): ToolDescriptor[] {
    return Array.from(this.tools.values()).map((tool) => tool.descriptor);
  }

  dispatch(name: string, rawArgs: JsonObject | string, context: ToolContext = NO_OP_CONTEXT): ToolOutcome {
    const tool = this.tools.get(name);
    if (!tool) throw new ToolDispatchError(`Unknown tool ${name}`, name, ['unknown_tool']);

    const args = parseToolArguments(name, rawArgs);
    let result: JsonValue;
    try {
      result = tool.run(args, context);
    } catch (e) {
      if (e instanceof ToolDispatchError) throw e;
      throw new ToolDispatchError(`Tool ${name} failed: ${describeError(e)}`, name, [describeError(e)]);
    }
    toolsLog(`dispatched ${name}`);
    return { name, arguments: args, result };
  }
}
