import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildApp } from "../../server.js";
import {
  buildRecord,
  buildServices,
  buildTemplate,
  type FakeServices,
} from "../../testing/fakes.js";

describe("/api/templates", () => {
  let app: FastifyInstance;
  let services: FakeServices;

  beforeEach(async () => {
    services = buildServices({
      templates: [buildTemplate()],
      records: [buildRecord()],
    });
    app = await buildApp({ services });
  });

  afterEach(async () => {
    await app.close();
  });

  it("POST creates a template with defaults", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/templates",
      payload: { name: "Follow-up", modelName: "crm.lead", body: "Hi ${object.name}" },
    });

    expect(res.statusCode).toBe(201);
    expect(res.json()).toMatchObject({
      name: "Follow-up",
      gatewayType: "both",
      interactiveType: "none",
      defaultGatewayId: null,
      active: true,
    });
  });

  it("POST returns 400 for an invalid placeholder", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/templates",
      payload: { name: "Broken", modelName: "crm.lead", body: "Hi ${customer.name}" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe(
      "Invalid placeholder: ${customer.name}. Use ${object.field_name}, ${user.field_name}, or ${company.field_name}",
    );
  });

  it("GET lists templates of one model", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/api/templates?modelName=res.partner",
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().map((t: { id: string }) => t.id)).toEqual(["tpl-1"]);
  });

  it("GET /:id returns 404 for an unknown template", async () => {
    const res = await app.inject({ method: "GET", url: "/api/templates/tpl-x" });

    expect(res.statusCode).toBe(404);
    expect(res.json().message).toBe("Template tpl-x not found");
  });

  it("PUT updates the body", async () => {
    const res = await app.inject({
      method: "PUT",
      url: "/api/templates/tpl-1",
      payload: { body: "Ciao ${object.name}" },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().body).toBe("Ciao ${object.name}");
  });

  it("DELETE deactivates the template", async () => {
    const res = await app.inject({ method: "DELETE", url: "/api/templates/tpl-1" });

    expect(res.statusCode).toBe(204);
    expect(services.templates.rows.get("tpl-1")?.active).toBe(false);
  });

  it("POST /:id/render previews against a record", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/templates/tpl-1/render",
      payload: { recordId: "7" },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      rendered: "Hi Ana, welcome to Acme",
      record: { model: "res.partner", id: "7", displayName: "Ana Rossi" },
    });
  });

  it("POST /:id/render without a body uses the model's first record", async () => {
    const res = await app.inject({ method: "POST", url: "/api/templates/tpl-1/render" });

    expect(res.statusCode).toBe(200);
    expect(res.json().rendered).toBe("Hi Ana, welcome to Acme");
  });

  it("POST /:id/render returns 404 for an unknown record", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/templates/tpl-1/render",
      payload: { recordId: "99" },
    });

    expect(res.statusCode).toBe(404);
    expect(res.json().message).toBe("Record res.partner/99 not found");
  });

  it("GET /:id/placeholders lists the record's fields", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/api/templates/tpl-1/placeholders",
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toContainEqual({
      placeholder: "${object.country.name}",
      description: "country",
    });
  });
});
