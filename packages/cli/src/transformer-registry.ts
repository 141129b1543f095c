/**
 * Transformer Registry
 *
 * Ordered list of project transformers. A file goes to the first
 * transformer whose canHandle() accepts it, so new container formats are
 * added by registration.
 */

import { SchemashiftError } from '@schemashift/core';
import {
  EgpTransformer,
  type IProjectTransformer,
  type ProjectTransformerOptions,
} from '@schemashift/archive';

export class TransformerRegistry {
  private readonly transformers: IProjectTransformer[] = [];

  /**
   * Append a transformer; earlier registrations win ties
   */
  register(transformer: IProjectTransformer): void {
    if (this.transformers.some((t) => t.name === transformer.name)) {
      throw new SchemashiftError({
        code: 'CONFIGURATION_ERROR',
        message: `Transformer '${transformer.name}' is already registered`,
        suggestion: 'Use a unique name for each transformer.',
      });
    }

    this.transformers.push(transformer);
  }

  /**
   * First transformer able to handle the file
   */
  resolve(filePath: string): IProjectTransformer | undefined {
    return this.transformers.find((t) => t.canHandle(filePath));
  }

  resolveOrThrow(filePath: string): IProjectTransformer {
    const transformer = this.resolve(filePath);

    if (!transformer) {
      throw new SchemashiftError({
        code: 'UNSUPPORTED_FILE',
        message: `No transformer can handle ${filePath}`,
        filePath,
        suggestion: `Registered transformers: ${this.listNames().join(', ') || 'none'}`,
      });
    }

    return transformer;
  }

  listNames(): string[] {
    return this.transformers.map((t) => t.name);
  }

  get size(): number {
    return this.transformers.length;
  }
}

/**
 * Registry with every built-in transformer
 */
export function createDefaultRegistry(options?: ProjectTransformerOptions): TransformerRegistry {
  const registry = new TransformerRegistry();
  registry.register(new EgpTransformer(options));
  return registry;
}
