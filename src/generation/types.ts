import type { SchemaObject } from 'ajv';
import type { ContextPackage } from '../context/types.js';
import type { JsonObject, JsonValue } from '../log/types.js';

export interface TextGeneration {
  kind: 'text';
  text: string;
  /** Who speaks the text; defaults to the narrator. */
  actor?: string;
}

export interface ToolCallRequest {
  kind: 'tool_call';
  name: string;
  /** Parsed object, or raw JSON text exactly as the model produced it. */
  arguments: JsonObject | string;
  actor?: string;
}

export type GenerationResult = TextGeneration | ToolCallRequest;

export interface GenerationRequest {
  context: ContextPackage;
  prompt: string;
  /** Names and descriptions of the tools the service may call. */
  tools: ToolDescriptor[];
}

/**
 * External text-generation capability. Transport, authentication and prompt
 * wording live behind this interface.
 */
export interface GenerationService {
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

export interface ToolDescriptor {
  name: string;
  description: string;
  /** JSON schema for the arguments object. */
  parameters: SchemaObject;
}

export interface ToolOutcome {
  name: string;
  arguments: JsonObject;
  result: JsonValue;
}
