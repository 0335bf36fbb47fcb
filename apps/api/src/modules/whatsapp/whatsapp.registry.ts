import type { Gateway, GatewayType } from "@wa-dispatch/shared-types";
import {
  UnknownGatewayTypeError,
  type GatewayProvider,
} from "./whatsapp.interface.js";

export type ProviderFactory = (gateway: Gateway) => GatewayProvider;

/**
 * Maps each gateway type to the factory that builds its provider.
 *
 * Providers are stateless HTTP adapters bound to one gateway's config, so a
 * fresh instance is created per dispatch.
 *
 * Usage:
 *   // Bootstrap (providers/index.ts)
 *   ProviderRegistry.register("meta_cloud_api", (g) => ...);
 *
 *   // Runtime (dispatch.service.ts)
 *   const provider = ProviderRegistry.forGateway(gateway);
 */
export class ProviderRegistry {
  private static readonly _factories = new Map<GatewayType, ProviderFactory>();

  /** Throws if the type already has a factory. */
  static register(type: GatewayType, factory: ProviderFactory): void {
    if (ProviderRegistry._factories.has(type)) {
      throw new Error(`Provider for gateway type "${type}" is already registered.`);
    }
    ProviderRegistry._factories.set(type, factory);
  }

  /**
   * @throws {UnknownGatewayTypeError} when no factory is registered for the
   *   gateway's type.
   */
  static forGateway(gateway: Gateway): GatewayProvider {
    const factory = ProviderRegistry._factories.get(gateway.type);
    if (!factory) {
      throw new UnknownGatewayTypeError(gateway.type);
    }
    return factory(gateway);
  }

  static has(type: GatewayType): boolean {
    return ProviderRegistry._factories.has(type);
  }

  /**
   * Removes every registered factory.
   * ONLY for use in tests.
   */
  static _reset(): void {
    ProviderRegistry._factories.clear();
  }
}
