import type { Gateway } from "@wa-dispatch/shared-types";
import { ProviderRegistry } from "../whatsapp.registry.js";
import { UnknownGatewayTypeError } from "../whatsapp.interface.js";
import { ExternalRestProvider } from "./external-rest.provider.js";
import { MetaCloudApiProvider } from "./meta-cloud.provider.js";

/**
 * WHATSAPP PROVIDER BOOTSTRAP
 *
 * Registers one factory per gateway type. To add a gateway variant:
 *   1. Add its config to the Gateway union in shared-types
 *   2. Create `<variant>.provider.ts` implementing GatewayProvider
 *   3. Register it here
 *
 * Called once during app bootstrap in server.ts. Safe to call again.
 */
export function registerProviders(): void {
  if (!ProviderRegistry.has("external_rest")) {
    ProviderRegistry.register("external_rest", (gateway: Gateway) => {
      if (gateway.type !== "external_rest") {
        throw new UnknownGatewayTypeError(gateway.type);
      }
      return new ExternalRestProvider(gateway.config);
    });
  }

  if (!ProviderRegistry.has("meta_cloud_api")) {
    ProviderRegistry.register("meta_cloud_api", (gateway: Gateway) => {
      if (gateway.type !== "meta_cloud_api") {
        throw new UnknownGatewayTypeError(gateway.type);
      }
      return new MetaCloudApiProvider(gateway.config);
    });
  }
}

export { ProviderRegistry } from "../whatsapp.registry.js";
export type { GatewayProvider, SendResult } from "../whatsapp.interface.js";
