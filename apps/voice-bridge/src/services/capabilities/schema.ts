import type {
  CapabilityDescriptor,
  EnumLiteral,
  EnumSchemaNode,
  SchemaNode,
  SchemaTranslationLoss
} from "./types.js";

/**
 * Function-declaration schema accepted by the Gemini Live API (an OpenAPI 3.0
 * subset). Anything not listed here is rejected by the service.
 */
export interface GeminiSchema {
  type: "object" | "array" | "string" | "number" | "integer" | "boolean";
  description?: string;
  nullable?: boolean;
  default?: unknown;
  format?: string;
  enum?: string[];
  properties?: Record<string, GeminiSchema>;
  required?: string[];
  items?: GeminiSchema;
  minItems?: number;
  maxItems?: number;
  minimum?: number;
  maximum?: number;
}

export interface GeminiFunctionDeclaration {
  name: string;
  description: string;
  parameters?: GeminiSchema;
}

export interface SchemaTargetProfile {
  supportsDefault: boolean;
}

export const GEMINI_LIVE_PROFILE: SchemaTargetProfile = { supportsDefault: false };

export interface ParsedSchema {
  node: SchemaNode | null;
  losses: SchemaTranslationLoss[];
}

export interface SchemaTranslation {
  schema: GeminiSchema;
  losses: SchemaTranslationLoss[];
  /** Number of object and array nodes walked. */
  containerNodes: number;
}

type ScalarType = "string" | "number" | "integer" | "boolean";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNullBranch(value: unknown): boolean {
  return isPlainObject(value) && value.type === "null";
}

function isEnumLiteral(value: unknown): value is EnumLiteral {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function nonNegativeInteger(value: unknown): number | undefined {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 ? value : undefined;
}

function finiteNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function literalType(value: EnumLiteral): ScalarType {
  if (typeof value === "string") {
    return "string";
  }
  if (typeof value === "boolean") {
    return "boolean";
  }
  return Number.isInteger(value) ? "integer" : "number";
}

function inferEnumValueType(values: EnumLiteral[]): ScalarType | null {
  const types = new Set(values.map(literalType));
  if (types.size === 1) {
    return [...types][0] ?? null;
  }
  if (types.size === 2 && types.has("integer") && types.has("number")) {
    return "number";
  }
  return null;
}

function readDeclaredType(
  raw: Record<string, unknown>,
  path: string,
  losses: SchemaTranslationLoss[]
): { type: string | null; nullable: boolean } {
  if (typeof raw.type === "string") {
    return { type: raw.type, nullable: false };
  }

  if (Array.isArray(raw.type)) {
    const names = raw.type.filter((item): item is string => typeof item === "string");
    const nonNull = names.filter((name) => name !== "null");
    const nullable = names.includes("null");
    if (nonNull.length === 1) {
      return { type: nonNull[0] ?? null, nullable };
    }
    losses.push({
      path,
      reason:
        nonNull.length === 0
          ? "null-only type has no target representation"
          : `type union [${nonNull.join(", ")}] has no target representation`
    });
    return { type: null, nullable };
  }

  if (Array.isArray(raw.enum)) {
    return { type: "enum", nullable: false };
  }
  if (raw.properties !== undefined) {
    return { type: "object", nullable: false };
  }
  if (raw.items !== undefined) {
    return { type: "array", nullable: false };
  }

  losses.push({ path, reason: "node declares no type" });
  return { type: null, nullable: false };
}

function unwrapUnion(
  raw: Record<string, unknown>,
  path: string,
  losses: SchemaTranslationLoss[]
): Record<string, unknown> | null {
  const branches = Array.isArray(raw.anyOf) ? raw.anyOf : Array.isArray(raw.oneOf) ? raw.oneOf : null;
  if (!branches) {
    return raw;
  }

  const nonNull = branches.filter((branch) => !isNullBranch(branch));
  const [only] = nonNull;
  if (nonNull.length !== 1 || !isPlainObject(only)) {
    losses.push({ path, reason: `union of ${nonNull.length} alternatives has no target representation` });
    return null;
  }

  const { anyOf: _anyOf, oneOf: _oneOf, ...outer } = raw;
  const merged: Record<string, unknown> = { ...only, ...outer };
  if (nonNull.length !== branches.length) {
    merged.nullable = true;
  }
  return merged;
}

function parseEnum(
  raw: Record<string, unknown>,
  declared: string,
  path: string,
  losses: SchemaTranslationLoss[]
): Omit<EnumSchemaNode, "description" | "default" | "nullable"> | null {
  const rawValues = Array.isArray(raw.enum) ? raw.enum : [];
  const values = rawValues.filter(isEnumLiteral);
  if (values.length !== rawValues.filter((value) => value !== null).length) {
    losses.push({ path, reason: "enum contains non-literal values" });
  }
  if (values.length === 0) {
    losses.push({ path, reason: "enum has no literal values" });
    return null;
  }

  const inferred = inferEnumValueType(values);
  const valueType =
    declared === "string" || declared === "number" || declared === "integer" || declared === "boolean"
      ? declared
      : inferred;
  if (!valueType || !inferred) {
    losses.push({ path, reason: "enum mixes literal types" });
    return null;
  }

  return {
    kind: "enum",
    valueType,
    values,
    ...(typeof raw.format === "string" ? { format: raw.format } : {})
  };
}

function parseNode(rawInput: unknown, path: string, losses: SchemaTranslationLoss[]): SchemaNode | null {
  if (!isPlainObject(rawInput)) {
    losses.push({ path, reason: "schema node is not an object" });
    return null;
  }

  if (typeof rawInput.$ref === "string") {
    losses.push({ path, reason: `reference ${rawInput.$ref} is not resolved` });
    return null;
  }

  const raw = unwrapUnion(rawInput, path, losses);
  if (!raw) {
    return null;
  }

  const declared = readDeclaredType(raw, path, losses);
  if (!declared.type) {
    return null;
  }

  const base = {
    ...(typeof raw.description === "string" ? { description: raw.description } : {}),
    ...(raw.default !== undefined ? { default: raw.default } : {}),
    ...(declared.nullable || raw.nullable === true ? { nullable: true } : {})
  };

  if (Array.isArray(raw.enum) && declared.type !== "object" && declared.type !== "array") {
    const node = parseEnum(raw, declared.type, path, losses);
    if (!node) {
      return null;
    }
    const nullable = raw.enum.includes(null) ? { nullable: true } : {};
    return { ...base, ...nullable, ...node };
  }

  switch (declared.type) {
    case "object": {
      const rawProperties = isPlainObject(raw.properties) ? raw.properties : {};
      const kept: Array<[string, SchemaNode]> = [];
      for (const [name, child] of Object.entries(rawProperties)) {
        const parsed = parseNode(child, `${path}.properties.${name}`, losses);
        if (parsed) {
          kept.push([name, parsed]);
        }
      }
      // fromEntries defines own keys, so "__proto__" stays a property name.
      const properties: Record<string, SchemaNode> = Object.fromEntries(kept);

      const rawRequired = Array.isArray(raw.required)
        ? raw.required.filter((item): item is string => typeof item === "string")
        : [];
      for (const name of rawRequired) {
        if (!Object.hasOwn(rawProperties, name)) {
          losses.push({ path: `${path}.required`, reason: `required property '${name}' has no schema` });
        }
      }

      return {
        ...base,
        kind: "object",
        properties,
        required: rawRequired.filter((name) => Object.hasOwn(properties, name))
      };
    }
    case "array": {
      let items: SchemaNode | undefined;
      if (Array.isArray(raw.items)) {
        losses.push({ path: `${path}.items`, reason: "tuple items have no target representation" });
      } else if (raw.items !== undefined) {
        items = parseNode(raw.items, `${path}.items`, losses) ?? undefined;
      }
      const minItems = nonNegativeInteger(raw.minItems);
      const maxItems = nonNegativeInteger(raw.maxItems);
      return {
        ...base,
        kind: "array",
        ...(items ? { items } : {}),
        ...(minItems !== undefined ? { minItems } : {}),
        ...(maxItems !== undefined ? { maxItems } : {})
      };
    }
    case "string":
      return {
        ...base,
        kind: "string",
        ...(typeof raw.format === "string" ? { format: raw.format } : {})
      };
    case "number":
    case "integer": {
      const minimum = finiteNumber(raw.minimum);
      const maximum = finiteNumber(raw.maximum);
      return {
        ...base,
        kind: declared.type,
        ...(typeof raw.format === "string" ? { format: raw.format } : {}),
        ...(minimum !== undefined ? { minimum } : {}),
        ...(maximum !== undefined ? { maximum } : {})
      };
    }
    case "boolean":
      return { ...base, kind: "boolean" };
    default:
      losses.push({ path, reason: `type '${declared.type}' has no target representation` });
      return null;
  }
}

/**
 * Parses a backend-reported JSON Schema into a {@link SchemaNode}. Constructs
 * with no target representation are dropped from their parent and reported
 * as losses; parsing never throws.
 */
export function parseSchemaNode(raw: unknown, path = "$"): ParsedSchema {
  const losses: SchemaTranslationLoss[] = [];
  const node = parseNode(raw, path, losses);
  return { node, losses };
}

interface TranslationContext {
  profile: SchemaTargetProfile;
  losses: SchemaTranslationLoss[];
  containerNodes: number;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled schema node: ${JSON.stringify(value)}`);
}

function translateNode(node: SchemaNode, path: string, context: TranslationContext): GeminiSchema {
  const common: Omit<GeminiSchema, "type"> = {
    ...(node.description !== undefined ? { description: node.description } : {}),
    ...(node.nullable ? { nullable: true } : {}),
    ...(context.profile.supportsDefault && node.default !== undefined ? { default: node.default } : {})
  };

  switch (node.kind) {
    case "object": {
      context.containerNodes += 1;
      const entries = Object.entries(node.properties).map(
        ([name, child]) => [name, translateNode(child, `${path}.properties.${name}`, context)] as const
      );
      return {
        type: "object",
        ...common,
        ...(entries.length > 0 ? { properties: Object.fromEntries(entries) } : {}),
        ...(node.required.length > 0 ? { required: [...node.required] } : {})
      };
    }
    case "array":
      context.containerNodes += 1;
      return {
        type: "array",
        ...common,
        ...(node.items ? { items: translateNode(node.items, `${path}.items`, context) } : {}),
        ...(node.minItems !== undefined ? { minItems: node.minItems } : {}),
        ...(node.maxItems !== undefined ? { maxItems: node.maxItems } : {})
      };
    case "string":
      return { type: "string", ...common, ...(node.format !== undefined ? { format: node.format } : {}) };
    case "number":
    case "integer":
      return {
        type: node.kind,
        ...common,
        ...(node.format !== undefined ? { format: node.format } : {}),
        ...(node.minimum !== undefined ? { minimum: node.minimum } : {}),
        ...(node.maximum !== undefined ? { maximum: node.maximum } : {})
      };
    case "boolean":
      return { type: "boolean", ...common };
    case "enum":
      return translateEnum(node, path, common, context);
    default:
      return assertNever(node);
  }
}

function translateEnum(
  node: EnumSchemaNode,
  path: string,
  common: Omit<GeminiSchema, "type">,
  context: TranslationContext
): GeminiSchema {
  const format = node.format !== undefined ? { format: node.format } : {};
  const strings = node.values.filter((value): value is string => typeof value === "string");
  if (node.valueType === "string" && strings.length === node.values.length) {
    return { type: "string", ...common, ...format, enum: strings };
  }

  // The target only enumerates strings; keep the base type rather than
  // stringifying the literals.
  context.losses.push({ path, reason: `enum of ${node.valueType} literals degraded to plain ${node.valueType}` });
  return { type: node.valueType, ...common, ...format };
}

export function translateSchemaWithReport(
  node: SchemaNode,
  profile: SchemaTargetProfile = GEMINI_LIVE_PROFILE
): SchemaTranslation {
  const context: TranslationContext = { profile, losses: [], containerNodes: 0 };
  const schema = translateNode(node, "$", context);
  return { schema, losses: context.losses, containerNodes: context.containerNodes };
}

export function translateSchema(node: SchemaNode, profile: SchemaTargetProfile = GEMINI_LIVE_PROFILE): GeminiSchema {
  return translateSchemaWithReport(node, profile).schema;
}

export function toFunctionDeclaration(
  descriptor: CapabilityDescriptor,
  profile: SchemaTargetProfile = GEMINI_LIVE_PROFILE
): { declaration: GeminiFunctionDeclaration; losses: SchemaTranslationLoss[] } {
  const declaration: GeminiFunctionDeclaration = {
    name: descriptor.name,
    description: descriptor.description
  };

  const node = descriptor.parameterSchema;
  if (!node) {
    return { declaration, losses: [] };
  }

  if (node.kind !== "object") {
    return {
      declaration,
      losses: [{ path: "$", reason: `parameters must be an object, got ${node.kind}` }]
    };
  }

  // The service rejects an object parameter block without properties.
  if (Object.keys(node.properties).length === 0) {
    return { declaration, losses: [] };
  }

  const translation = translateSchemaWithReport(node, profile);
  return {
    declaration: { ...declaration, parameters: translation.schema },
    losses: translation.losses
  };
}
