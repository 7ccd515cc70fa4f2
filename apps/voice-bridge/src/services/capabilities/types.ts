interface SchemaNodeBase {
  description?: string;
  default?: unknown;
  nullable?: boolean;
}

export interface ObjectSchemaNode extends SchemaNodeBase {
  kind: "object";
  properties: Record<string, SchemaNode>;
  required: string[];
}

export interface ArraySchemaNode extends SchemaNodeBase {
  kind: "array";
  items?: SchemaNode;
  minItems?: number;
  maxItems?: number;
}

export interface StringSchemaNode extends SchemaNodeBase {
  kind: "string";
  format?: string;
}

export interface NumericSchemaNode extends SchemaNodeBase {
  kind: "number" | "integer";
  format?: string;
  minimum?: number;
  maximum?: number;
}

export interface BooleanSchemaNode extends SchemaNodeBase {
  kind: "boolean";
}

export type EnumLiteral = string | number | boolean;

export interface EnumSchemaNode extends SchemaNodeBase {
  kind: "enum";
  valueType: "string" | "number" | "integer" | "boolean";
  values: EnumLiteral[];
  format?: string;
}

export type SchemaNode =
  | ObjectSchemaNode
  | ArraySchemaNode
  | StringSchemaNode
  | NumericSchemaNode
  | BooleanSchemaNode
  | EnumSchemaNode;

export type SchemaKind = SchemaNode["kind"];

export interface SchemaTranslationLoss {
  path: string;
  reason: string;
}

export interface CapabilityDescriptor {
  readonly name: string;
  readonly description: string;
  /** Schema exactly as the backend reported it; arguments are validated against this. */
  readonly inputSchema: unknown;
  readonly parameterSchema: SchemaNode | null;
  readonly ownerSessionId: string;
}

export interface InvocationRequest {
  callId: string;
  capabilityName: string;
  arguments: Record<string, unknown>;
}

export type CapabilityErrorCode =
  | "UnknownCapability"
  | "BackendUnavailable"
  | "CapabilityTimeout"
  | "InvalidArguments"
  | "CapabilityFailed"
  | "CapabilityCancelled"
  | "ToolCallInProgress";

export type InvocationResult =
  | {
      callId: string;
      capabilityName: string;
      success: true;
      payload: unknown;
    }
  | {
      callId: string;
      capabilityName: string;
      success: false;
      error: CapabilityErrorCode;
      message: string;
    };
