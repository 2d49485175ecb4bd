import type { ZodTypeAny, infer as ZodInfer } from "zod";

export interface TaskContext {
  metadata: Record<string, unknown>;
  setMetadata: (key: string, value: unknown) => void;
  log: (line: string) => void;
}

export interface TaskResult {
  title: string;
  success: boolean;
  metadata: Record<string, unknown>;
  output: string;
}

export interface TaskDefinition<T extends ZodTypeAny> {
  id: string;
  name: string;
  description: string;
  parameters: T;
  execute: (args: ZodInfer<T>, context: TaskContext) => Promise<TaskResult>;
}

interface RegisteredTask {
  id: string;
  execute: (args: unknown, context: TaskContext) => Promise<TaskResult>;
  definition: Omit<TaskDefinition<ZodTypeAny>, "execute">;
}

const registry = new Map<string, RegisteredTask>();

export class Task {
  static define<T extends ZodTypeAny>(
    id: string,
    config: {
      name: string;
      description: string;
      parameters: T;
      execute: (args: ZodInfer<T>, context: TaskContext) => Promise<TaskResult>;
    }
  ): TaskDefinition<T> {
    const definition: TaskDefinition<T> = {
      id,
      name: config.name,
      description: config.description,
      parameters: config.parameters,
      execute: config.execute,
    };

    registry.set(id, {
      id,
      execute: (args, context) => config.execute(config.parameters.parse(args), context),
      definition: { id, name: config.name, description: config.description, parameters: config.parameters },
    });
    return definition;
  }

  static list(): Array<Omit<TaskDefinition<ZodTypeAny>, "execute">> {
    return Array.from(registry.values()).map((r) => r.definition);
  }

  /**
   * Parse `args` against the task's schema and run it. Metadata the task records on
   * its context is merged under the result's own metadata.
   */
  static async execute(
    id: string,
    args: Record<string, unknown> = {},
    context?: Partial<TaskContext>
  ): Promise<TaskResult> {
    const task = registry.get(id);
    if (!task) {
      throw new Error(`Task not found: ${id}`);
    }

    const fullContext: TaskContext = {
      metadata: context?.metadata ?? {},
      setMetadata: (key, value) => {
        fullContext.metadata[key] = value;
      },
      log: context?.log ?? ((line) => console.log(line)),
    };

    const result = await task.execute(args, fullContext);
    return {
      ...result,
      metadata: { ...fullContext.metadata, ...result.metadata },
    };
  }
}
