import { describe, it, expect, afterEach, vi } from "vitest";
import { MetaCloudApiProvider, metaEndpoint } from "./meta-cloud.provider.js";
import { GatewaySendFailedError } from "../whatsapp.interface.js";

const CONFIG = {
  phoneNumberId: "123",
  accessToken: "test-token",
  senderName: null,
};

function mockFetchResponse(status: number, body: string) {
  const fetchSpy = vi.fn().mockResolvedValue({
    ok: status >= 200 && status < 300,
    status,
    text: () => Promise.resolve(body),
  });
  vi.stubGlobal("fetch", fetchSpy);
  return fetchSpy;
}

describe("MetaCloudApiProvider", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("derives the Graph API endpoint from the phone number id", () => {
    expect(metaEndpoint("123")).toBe("https://graph.facebook.com/v18.0/123/messages");
    expect(new MetaCloudApiProvider(CONFIG).endpoint).toBe(
      "https://graph.facebook.com/v18.0/123/messages",
    );
  });

  it("posts a text message without the leading plus", async () => {
    const fetchSpy = mockFetchResponse(200, '{"messages":[{"id":"wamid.1"}]}');

    const result = await new MetaCloudApiProvider(CONFIG).send(
      "Hello",
      "+15551234567",
    );

    const [url, options] = fetchSpy.mock.calls[0] as [
      string,
      { method: string; headers: Record<string, string>; body: string },
    ];
    expect(url).toBe("https://graph.facebook.com/v18.0/123/messages");
    expect(options.method).toBe("POST");
    expect(options.headers["Authorization"]).toBe("Bearer test-token");
    expect(JSON.parse(options.body)).toEqual({
      messaging_product: "whatsapp",
      to: "15551234567",
      type: "text",
      text: { body: "Hello" },
    });
    expect(result).toEqual({
      statusCode: 200,
      responseBody: '{"messages":[{"id":"wamid.1"}]}',
    });
  });

  it("throws GatewaySendFailedError on an auth failure", async () => {
    mockFetchResponse(401, '{"error":{"message":"Invalid OAuth access token"}}');

    const err: unknown = await new MetaCloudApiProvider(CONFIG)
      .send("Hello", "+15551234567")
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(GatewaySendFailedError);
    expect((err as GatewaySendFailedError).message).toBe(
      'Meta Cloud API responded 401: {"error":{"message":"Invalid OAuth access token"}}',
    );
    expect((err as GatewaySendFailedError).responseCode).toBe("401");
    expect((err as GatewaySendFailedError).gatewayType).toBe("meta_cloud_api");
  });

  it('wraps non-Error rejections as "Unknown network failure"', async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue("string-error"));

    await expect(
      new MetaCloudApiProvider(CONFIG).send("Hello", "+15551234567"),
    ).rejects.toThrow("Meta Cloud API network error: Unknown network failure");
  });
});
