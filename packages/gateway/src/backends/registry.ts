/**
 * Backend factory registry
 *
 * Maps a connection kind to the factory that builds its client. New kinds
 * register a factory; nothing subclasses a base client.
 */

import {
  BackendKindSchema,
  ValidationError,
  logger,
  validateInput,
  type BackendClient,
  type BackendClientFactory,
  type BackendFactoryContext,
} from '@toolgate/core';

export class BackendRegistry {
  private readonly factories = new Map<string, BackendClientFactory>();

  register(kind: string, factory: BackendClientFactory): void {
    validateInput(BackendKindSchema, kind, 'backend kind');
    if (this.factories.has(kind)) {
      logger.warn(`[gateway] Replacing backend factory for kind "${kind}"`);
    }
    this.factories.set(kind, factory);
  }

  has(kind: string): boolean {
    return this.factories.has(kind);
  }

  kinds(): string[] {
    return [...this.factories.keys()];
  }

  /**
   * Build a client for one connection
   *
   * @throws ValidationError if no factory is registered for the connection's kind
   */
  create(context: BackendFactoryContext): BackendClient {
    const factory = this.factories.get(context.connection.kind);
    if (!factory) {
      throw new ValidationError(`Unsupported backend kind: ${context.connection.kind}`, {
        kind: context.connection.kind,
      });
    }
    return factory(context);
  }
}
