import { Logger } from "../logger";
import { SchemaNode, toJsonSchema } from "../schema/schemaCompiler";
import { loadSchema } from "../schema/schemaLoader";
import { JsonObject, ToolContextResult } from "../types";
import { SearchContextProvider } from "./contextProvider";
import { ToolArguments } from "./toolArguments";

export type ToolDescriptor = {
  readonly name: string;
  readonly description: string;
  readonly argumentSchema: SchemaNode;
};

export type ToolHandler = {
  name: string;
  execute: (args: ToolArguments) => Promise<ToolContextResult>;
};

export type ToolDependencies = {
  contextProvider: SearchContextProvider;
  schemaDir: string;
  logger: Logger;
};

export type ToolModule = {
  registerTool: (registry: ToolRegistry, deps: ToolDependencies) => void;
};

export type ToolDefinition = {
  name: string;
  description: string;
  parameters: JsonObject;
};

export type OpenAITool = {
  type: "function";
  function: ToolDefinition & { strict: boolean };
};

type RegisteredTool = {
  descriptor: ToolDescriptor;
  handler: ToolHandler;
};

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();
  private frozen = false;

  register(handler: ToolHandler, descriptor: ToolDescriptor): void {
    if (this.frozen) {
      throw new Error(`Tool catalogue is frozen; cannot register ${descriptor.name}`);
    }
    if (handler.name !== descriptor.name) {
      throw new Error(`Handler ${handler.name} does not match descriptor ${descriptor.name}`);
    }
    if (this.tools.has(descriptor.name)) {
      throw new Error(`Tool already registered: ${descriptor.name}`);
    }
    this.tools.set(descriptor.name, {
      descriptor: Object.freeze({ ...descriptor }),
      handler
    });
  }

  /** Closes the catalogue; later registrations throw. */
  freeze(): void {
    this.frozen = true;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  get(name: string): ToolHandler | undefined {
    return this.tools.get(name)?.handler;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  listNames(): string[] {
    return Array.from(this.tools.keys());
  }

  listDescriptors(): ToolDescriptor[] {
    return Array.from(this.tools.values()).map((tool) => tool.descriptor);
  }

  buildToolDefinitions(): ToolDefinition[] {
    return this.listDescriptors().map((descriptor) => ({
      name: descriptor.name,
      description: descriptor.description,
      parameters: toJsonSchema(descriptor.argumentSchema)
    }));
  }

  buildOpenAITools(): OpenAITool[] {
    return this.buildToolDefinitions().map((definition) => ({
      type: "function",
      function: {
        name: definition.name,
        strict: false,
        description: definition.description,
        parameters: definition.parameters
      }
    }));
  }
}

/**
 * Convenience for tool modules: a descriptor whose argument schema comes from
 * `<schemaDir>/<name>.json`.
 */
export function describeTool(name: string, description: string, schemaDir: string): ToolDescriptor {
  return {
    name,
    description,
    argumentSchema: loadSchema(name, schemaDir)
  };
}
