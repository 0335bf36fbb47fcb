import { describe, it, expect, beforeEach } from "vitest";
import {
  TemplateNotFoundError,
  createTemplate,
  deactivateTemplate,
  getTemplatePlaceholders,
  listTemplates,
  previewTemplate,
  updateTemplate,
} from "./templates.service.js";
import { InvalidPlaceholderError } from "./templates.renderer.js";
import { GatewayNotFoundError } from "../gateways/gateways.errors.js";
import { RecordNotFoundError } from "../records/records.interface.js";
import {
  buildExternalRestGateway,
  buildRecord,
  buildServices,
  buildTemplate,
  type FakeServices,
} from "../../testing/fakes.js";
import type { CreateTemplateInput } from "./templates.schema.js";

const NEW_TEMPLATE: CreateTemplateInput = {
  name: "Reminder",
  modelName: "res.partner",
  gatewayType: "both",
  defaultGatewayId: null,
  body: "Dear ${object.name}, see you soon",
  mediaUrl: null,
  interactiveType: "none",
  active: true,
};

describe("templates.service", () => {
  let services: FakeServices;

  beforeEach(() => {
    services = buildServices({
      gateways: [buildExternalRestGateway()],
      templates: [buildTemplate()],
      records: [
        buildRecord(),
        buildRecord({ id: "12", displayName: "Luca Bianchi", fields: { name: "Luca" } }),
      ],
    });
  });

  describe("createTemplate", () => {
    it("stores a template with a valid body", async () => {
      const created = await createTemplate(services, NEW_TEMPLATE);

      expect(created.id).toBe("tpl-new-1");
      expect(services.templates.rows.get("tpl-new-1")?.body).toBe(
        "Dear ${object.name}, see you soon",
      );
    });

    it("rejects a body with an unknown placeholder root", async () => {
      await expect(
        createTemplate(services, { ...NEW_TEMPLATE, body: "Hi ${partner.name}" }),
      ).rejects.toThrow(InvalidPlaceholderError);
      expect(services.templates.rows.size).toBe(1);
    });

    it("rejects a default gateway that does not exist", async () => {
      await expect(
        createTemplate(services, { ...NEW_TEMPLATE, defaultGatewayId: "gw-missing" }),
      ).rejects.toThrow(GatewayNotFoundError);
    });
  });

  describe("updateTemplate", () => {
    it("changes only the given fields", async () => {
      const updated = await updateTemplate(services, "tpl-1", {
        name: "Welcome v2",
        defaultGatewayId: "gw-rest",
      });

      expect(updated.name).toBe("Welcome v2");
      expect(updated.defaultGatewayId).toBe("gw-rest");
      expect(updated.body).toBe("Hi ${object.name}, welcome to ${company.name}");
    });

    it("validates a new body", async () => {
      await expect(
        updateTemplate(services, "tpl-1", { body: "${object}" }),
      ).rejects.toThrow(InvalidPlaceholderError);
    });

    it("throws TemplateNotFoundError for an unknown id", async () => {
      await expect(updateTemplate(services, "nope", { name: "x" })).rejects.toThrow(
        TemplateNotFoundError,
      );
    });
  });

  it("deactivateTemplate keeps the row and hides it from active listings", async () => {
    await deactivateTemplate(services, "tpl-1");

    expect(services.templates.rows.get("tpl-1")?.active).toBe(false);
    expect(await listTemplates(services, { activeOnly: true })).toEqual([]);
    expect(await listTemplates(services, { activeOnly: false })).toHaveLength(1);
  });

  describe("previewTemplate", () => {
    it("renders against the requested record", async () => {
      const preview = await previewTemplate(services, "tpl-1", "12");

      expect(preview).toEqual({
        rendered: "Hi Luca, welcome to Acme",
        record: { model: "res.partner", id: "12", displayName: "Luca Bianchi" },
      });
    });

    it("falls back to the model's first record", async () => {
      const preview = await previewTemplate(services, "tpl-1");

      expect(preview.record.id).toBe("12");
      expect(preview.rendered).toBe("Hi Luca, welcome to Acme");
    });

    it("throws RecordNotFoundError for an unknown record", async () => {
      await expect(previewTemplate(services, "tpl-1", "999")).rejects.toThrow(
        "Record res.partner/999 not found",
      );
    });

    it("throws RecordNotFoundError when the model has no records", async () => {
      services.templates.rows.set(
        "tpl-lead",
        buildTemplate({ id: "tpl-lead", modelName: "crm.lead" }),
      );

      await expect(previewTemplate(services, "tpl-lead")).rejects.toThrow(
        RecordNotFoundError,
      );
      await expect(previewTemplate(services, "tpl-lead")).rejects.toThrow(
        "No records found in model crm.lead to test with",
      );
    });
  });

  describe("getTemplatePlaceholders", () => {
    it("derives placeholders from the given record", async () => {
      const placeholders = await getTemplatePlaceholders(services, "tpl-1", "7");

      expect(placeholders.map((p) => p.placeholder)).toContain("${object.country.name}");
    });

    it("returns the generic set when the model has no records", async () => {
      services.templates.rows.set(
        "tpl-lead",
        buildTemplate({ id: "tpl-lead", modelName: "crm.lead" }),
      );

      const placeholders = await getTemplatePlaceholders(services, "tpl-lead");
      expect(placeholders).toHaveLength(4);
    });
  });
});
