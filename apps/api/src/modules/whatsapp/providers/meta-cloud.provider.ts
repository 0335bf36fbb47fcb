import type { MetaCloudApiConfig } from "@wa-dispatch/shared-types";
import type { GatewayProvider, SendResult } from "../whatsapp.interface.js";
import { requestGateway } from "./http.js";

const GRAPH_API_BASE = "https://graph.facebook.com/v18.0";

export function metaEndpoint(phoneNumberId: string): string {
  return `${GRAPH_API_BASE}/${phoneNumberId}/messages`;
}

interface MetaTextMessagePayload {
  messaging_product: "whatsapp";
  to: string;
  type: "text";
  text: { body: string };
}

/**
 * Meta WhatsApp Cloud API provider.
 *
 * API reference: https://developers.facebook.com/docs/whatsapp/cloud-api
 * Endpoint: POST https://graph.facebook.com/v18.0/{phoneNumberId}/messages
 * Auth: Bearer access token
 */
export class MetaCloudApiProvider implements GatewayProvider {
  readonly type = "meta_cloud_api";

  constructor(private readonly config: MetaCloudApiConfig) {}

  get endpoint(): string {
    return metaEndpoint(this.config.phoneNumberId);
  }

  async send(message: string, address: string): Promise<SendResult> {
    // Graph API expects the number without the leading "+".
    const payload: MetaTextMessagePayload = {
      messaging_product: "whatsapp",
      to: address.replace(/^\++/, ""),
      type: "text",
      text: { body: message },
    };

    return requestGateway(this.type, "Meta Cloud API", this.endpoint, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.config.accessToken}`,
      },
      body: JSON.stringify(payload),
    });
  }
}
