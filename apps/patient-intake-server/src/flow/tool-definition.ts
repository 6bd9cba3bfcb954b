import { z } from 'zod';
import { FlowError } from './flow-error';
import {
  NodeTool,
  ToolInvocationResult,
  ToolParameter,
  ToolParameterType,
  ToolSchema,
} from './flow.types';

export type ToolArguments<TShape extends z.ZodRawShape> = z.infer<z.ZodObject<TShape, 'strip'>>;

export type ToolHandler<TContext, TShape extends z.ZodRawShape> = (
  args: ToolArguments<TShape>,
  context: TContext,
) => Promise<ToolInvocationResult<TContext>>;

export type ToolDefinition<TContext, TShape extends z.ZodRawShape> = {
  name: string;
  description: string;
  parameters: TShape;
  handler: ToolHandler<TContext, TShape>;
};

/**
 * Binds a handler to its parameter shape. The returned tool validates raw model
 * arguments against the same shape that produced its {@link ToolSchema}, so a
 * handler only ever sees arguments the model was told about.
 */
export const defineTool = <TContext, TShape extends z.ZodRawShape>(
  definition: ToolDefinition<TContext, TShape>,
): NodeTool<TContext> => {
  const argumentsSchema = z.object(definition.parameters);
  const schema: ToolSchema = {
    name: definition.name,
    description: definition.description,
    parameters: describeParameters(definition.parameters),
  };

  return {
    schema,
    async run(rawArgs: unknown, context: TContext): Promise<ToolInvocationResult<TContext>> {
      const parsed = argumentsSchema.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        throw new FlowError(
          'invalid_arguments',
          `Invalid arguments for ${definition.name}: ${formatIssues(parsed.error)}`,
          parsed.error.issues,
        );
      }
      return definition.handler(parsed.data, context);
    },
  };
};

export const describeParameters = (shape: z.ZodRawShape): Record<string, ToolParameter> => {
  const parameters: Record<string, ToolParameter> = {};
  for (const [name, field] of Object.entries(shape)) {
    parameters[name] = {
      type: resolveParameterType(field),
      required: !field.isOptional(),
      ...(field.description ? { description: field.description } : {}),
    };
  }
  return parameters;
};

/** JSON-schema `parameters` object for a function tool, as model providers expect it. */
export const toParametersJsonSchema = (schema: ToolSchema): Record<string, unknown> => {
  const properties: Record<string, Record<string, string>> = {};
  const required: string[] = [];
  for (const [name, parameter] of Object.entries(schema.parameters)) {
    properties[name] = {
      type: parameter.type,
      ...(parameter.description ? { description: parameter.description } : {}),
    };
    if (parameter.required) {
      required.push(name);
    }
  }
  return {
    type: 'object',
    properties,
    required,
    additionalProperties: false,
  };
};

const resolveParameterType = (field: z.ZodTypeAny): ToolParameterType => {
  const inner = field instanceof z.ZodOptional ? field.unwrap() : field;
  if (inner instanceof z.ZodString) return 'string';
  if (inner instanceof z.ZodNumber) return 'number';
  if (inner instanceof z.ZodBoolean) return 'boolean';
  throw new Error(`Unsupported tool parameter type: ${inner.constructor.name}`);
};

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      if (issue.code === 'invalid_type' && issue.received === 'undefined') {
        return `missing required argument "${path}"`;
      }
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
