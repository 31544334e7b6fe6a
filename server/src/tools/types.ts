/**
 * Tool Interfaces
 *
 * A tool is a capability the upstream model may invoke by name with
 * JSON-schema-typed arguments, producing a structured result.
 */

export type ToolArguments = Record<string, unknown>;

export interface ToolResult {
  success: boolean;
  message: string;
  [field: string]: unknown;
}

export interface ParameterProperty {
  type: 'string' | 'number' | 'integer' | 'boolean';
  description?: string;
}

export interface ToolParameterSchema {
  type: 'object';
  properties: Record<string, ParameterProperty>;
  required: string[];
}

/**
 * Function definition in the shape the realtime API expects inside `session.update`
 */
export interface FunctionDefinition {
  type: 'function';
  name: string;
  description: string;
  parameters: ToolParameterSchema;
}

export interface Tool {
  readonly name: string;
  readonly description: string;
  readonly parameters: ToolParameterSchema;

  /**
   * Run the tool. Validation problems with the arguments are reported through
   * `success: false`; a thrown error means the capability itself failed.
   */
  execute(args: ToolArguments): Promise<ToolResult>;
}

export function toFunctionDefinition(tool: Tool): FunctionDefinition {
  return {
    type: 'function',
    name: tool.name,
    description: tool.description,
    parameters: tool.parameters,
  };
}

/**
 * Read a string argument, treating other types and blank strings as absent
 */
export function stringArg(args: ToolArguments, key: string): string | undefined {
  const value = args[key];
  if (typeof value !== 'string') return undefined;
  return value.trim() === '' ? undefined : value;
}
