import type { AppConfig } from "../lib/config.js";
import type { GatewayRepository } from "../modules/gateways/gateways.repository.js";
import type { TemplateRepository } from "../modules/templates/templates.repository.js";
import type { LogStore } from "../modules/logs/logs.repository.js";
import type { RecordHost } from "../modules/records/records.interface.js";
import type { DispatchQueue } from "../jobs/dispatch/dispatch.queue.js";

/**
 * Everything the services need, injected as one object. Service functions
 * take the narrowest `Pick<AppServices, ...>` they use, so tests only build
 * what they exercise.
 */
export interface AppServices {
  config: AppConfig;
  gateways: GatewayRepository;
  templates: TemplateRepository;
  logs: LogStore;
  records: RecordHost;
  dispatchQueue: DispatchQueue;
}
