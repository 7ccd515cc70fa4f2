export interface ArgumentIssue {
  path: string;
  message: string;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeValue(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (Array.isArray(value)) {
    return "array";
  }
  if (typeof value === "number" && Number.isInteger(value)) {
    return "integer";
  }
  return typeof value;
}

function matchesType(expected: string, value: unknown): boolean {
  switch (expected) {
    case "object":
      return isPlainObject(value);
    case "array":
      return Array.isArray(value);
    case "string":
      return typeof value === "string";
    case "number":
      return typeof value === "number" && Number.isFinite(value);
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "boolean":
      return typeof value === "boolean";
    case "null":
      return value === null;
    default:
      // Unknown type names are the backend's business, not ours.
      return true;
  }
}

function declaredTypes(schema: Record<string, unknown>): string[] {
  const types =
    typeof schema.type === "string"
      ? [schema.type]
      : Array.isArray(schema.type)
        ? schema.type.filter((type): type is string => typeof type === "string")
        : [];
  if (schema.nullable === true && types.length > 0 && !types.includes("null")) {
    return [...types, "null"];
  }
  return types;
}

function checkBounds(schema: Record<string, unknown>, value: unknown, path: string, issues: ArgumentIssue[]): void {
  if (typeof value === "string") {
    if (typeof schema.minLength === "number" && value.length < schema.minLength) {
      issues.push({ path, message: `must be at least ${schema.minLength} characters` });
    }
    if (typeof schema.maxLength === "number" && value.length > schema.maxLength) {
      issues.push({ path, message: `must be at most ${schema.maxLength} characters` });
    }
  }

  if (typeof value === "number") {
    if (typeof schema.minimum === "number" && value < schema.minimum) {
      issues.push({ path, message: `must be >= ${schema.minimum}` });
    }
    if (typeof schema.maximum === "number" && value > schema.maximum) {
      issues.push({ path, message: `must be <= ${schema.maximum}` });
    }
  }

  if (Array.isArray(value)) {
    if (typeof schema.minItems === "number" && value.length < schema.minItems) {
      issues.push({ path, message: `must have at least ${schema.minItems} items` });
    }
    if (typeof schema.maxItems === "number" && value.length > schema.maxItems) {
      issues.push({ path, message: `must have at most ${schema.maxItems} items` });
    }
  }
}

function checkObject(
  schema: Record<string, unknown>,
  value: Record<string, unknown>,
  path: string,
  issues: ArgumentIssue[]
): void {
  const properties = isPlainObject(schema.properties) ? schema.properties : {};
  const required = Array.isArray(schema.required)
    ? schema.required.filter((name): name is string => typeof name === "string")
    : [];

  for (const name of required) {
    if (!Object.hasOwn(value, name) || value[name] === undefined) {
      issues.push({ path, message: `missing required property '${name}'` });
    }
  }

  for (const [name, propertyValue] of Object.entries(value)) {
    const propertySchema = Object.hasOwn(properties, name) ? properties[name] : undefined;
    if (propertySchema !== undefined) {
      checkValue(propertySchema, propertyValue, `${path}.${name}`, issues);
    } else if (schema.additionalProperties === false) {
      issues.push({ path: `${path}.${name}`, message: "is not an accepted property" });
    } else if (isPlainObject(schema.additionalProperties)) {
      checkValue(schema.additionalProperties, propertyValue, `${path}.${name}`, issues);
    }
  }
}

function checkValue(schemaInput: unknown, value: unknown, path: string, issues: ArgumentIssue[]): void {
  if (!isPlainObject(schemaInput)) {
    return;
  }
  const schema = schemaInput;

  const branches = Array.isArray(schema.anyOf) ? schema.anyOf : Array.isArray(schema.oneOf) ? schema.oneOf : null;
  if (branches) {
    const matched = branches.some((branch) => {
      const branchIssues: ArgumentIssue[] = [];
      checkValue(branch, value, path, branchIssues);
      return branchIssues.length === 0;
    });
    if (!matched) {
      issues.push({ path, message: "does not match any allowed alternative" });
    }
    return;
  }

  const types = declaredTypes(schema);
  if (types.length > 0 && !types.some((type) => matchesType(type, value))) {
    issues.push({ path, message: `expected ${types.join("|")}, got ${describeValue(value)}` });
    return;
  }

  if (Array.isArray(schema.enum) && !schema.enum.some((option) => option === value)) {
    issues.push({ path, message: `must be one of ${schema.enum.map((option) => JSON.stringify(option)).join(", ")}` });
  }
  if (schema.const !== undefined && schema.const !== value) {
    issues.push({ path, message: `must equal ${JSON.stringify(schema.const)}` });
  }

  checkBounds(schema, value, path, issues);

  if (Array.isArray(value) && isPlainObject(schema.items)) {
    const itemSchema = schema.items;
    value.forEach((item, index) => checkValue(itemSchema, item, `${path}[${index}]`, issues));
  }

  if (isPlainObject(value)) {
    checkObject(schema, value, path, issues);
  }
}

/**
 * Checks invocation arguments against a capability's reported input schema.
 * Covers the JSON Schema keywords tool servers commonly emit; anything else is
 * left for the backend to enforce.
 */
export function validateArguments(schema: unknown, value: unknown): ArgumentIssue[] {
  const issues: ArgumentIssue[] = [];
  checkValue(schema, value, "$", issues);
  return issues;
}

export function formatArgumentIssues(issues: ArgumentIssue[]): string {
  return issues.map((issue) => `${issue.path} ${issue.message}`).join("; ");
}
