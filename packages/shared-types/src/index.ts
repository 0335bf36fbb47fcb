export type GatewayType = "external_rest" | "meta_cloud_api";

export type TemplateGatewayType = GatewayType | "both";

export type HttpMethod = "GET" | "POST";

export type LogStatus = "success" | "error";

export type InteractiveType = "none" | "button" | "list";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export interface ExternalRestConfig {
  url: string;
  httpMethod: HttpMethod;
  recipientParam: string | null;
  messageParam: string | null;
  apiKeyParam: string | null;
  apiKeyValue: string | null;
  headers: Record<string, string> | null;
  paramsTemplate: JsonObject | null;
}

export interface MetaCloudApiConfig {
  phoneNumberId: string;
  accessToken: string;
  senderName: string | null;
}

interface GatewayBase {
  id: string;
  name: string;
  active: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface ExternalRestGateway extends GatewayBase {
  type: "external_rest";
  config: ExternalRestConfig;
}

export interface MetaCloudApiGateway extends GatewayBase {
  type: "meta_cloud_api";
  config: MetaCloudApiConfig;
}

export type Gateway = ExternalRestGateway | MetaCloudApiGateway;

export interface Template {
  id: string;
  name: string;
  modelName: string;
  gatewayType: TemplateGatewayType;
  defaultGatewayId: string | null;
  body: string;
  mediaUrl: string | null;
  interactiveType: InteractiveType;
  active: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface LogEntry {
  id: string;
  gatewayId: string;
  gatewayType: GatewayType;
  message: string;
  phoneNumber: string;
  status: LogStatus;
  responseCode: string;
  responseBody: string;
  timestamp: Date;
  sourceModel: string | null;
  sourceRecordId: string | null;
  templateId: string | null;
  jobId: string | null;
}

export type DispatchJobState =
  | "waiting"
  | "delayed"
  | "active"
  | "completed"
  | "failed"
  | "unknown";

export interface PaginatedResponse<T> {
  data: T[];
  total: number;
  page: number;
  limit: number;
}
