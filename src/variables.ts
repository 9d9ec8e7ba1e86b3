import type { Variable, VariableType } from "./types.js";

/**
 * A variable reference: `{{` + identifier + `}}`, no whitespace inside the braces.
 * Anything else (`{{ name }}`, `{{1abc}}`, `{{}}`) stays literal text.
 */
const VARIABLE_TOKEN = /\{\{([A-Za-z_][A-Za-z0-9_]*)\}\}/g;

export const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export type VariableValues = Readonly<Record<string, string>>;

export interface LivePreview {
  preview: string;
  missing: string[];
}

/**
 * Returns each variable name referenced in `content` once, in order of first appearance.
 */
export function extractVariables(content: string): string[] {
  const seen = new Set<string>();
  for (const match of content.matchAll(VARIABLE_TOKEN)) {
    seen.add(match[1]);
  }
  return [...seen];
}

/**
 * Merges the names referenced in `content` with existing definitions.
 * Referenced names keep their definition or get a blank text variable;
 * unreferenced definitions are appended in their original order.
 */
export function reconcileVariables(content: string, existing: readonly Variable[]): Variable[] {
  const byName = new Map<string, Variable>();
  for (const variable of existing) {
    if (!byName.has(variable.name)) byName.set(variable.name, variable);
  }

  const referenced = extractVariables(content);
  const result = referenced.map((name) => byName.get(name) ?? blankVariable(name));

  const used = new Set(referenced);
  for (const variable of existing) {
    if (!used.has(variable.name)) {
      result.push(variable);
      used.add(variable.name);
    }
  }
  return result;
}

/**
 * Like reconcileVariables, but drops definitions the content no longer references.
 */
export function pruneVariables(content: string, existing: readonly Variable[]): Variable[] {
  const referenced = new Set(extractVariables(content));
  return reconcileVariables(content, existing).filter((v) => referenced.has(v.name));
}

/**
 * Replaces every recognised token that has a value. Tokens without a value are
 * left as `{{name}}`. Substituted values are not scanned again.
 */
export function substituteVariables(content: string, values: VariableValues): string {
  return content.replace(VARIABLE_TOKEN, (token: string, name: string) =>
    Object.hasOwn(values, name) ? values[name] : token
  );
}

/**
 * Names referenced in `content` whose value is absent or blank, in extraction order.
 */
export function getMissingVariables(content: string, values: VariableValues): string[] {
  return extractVariables(content).filter((name) => {
    if (!Object.hasOwn(values, name)) return true;
    return values[name].trim() === "";
  });
}

export function generateLivePreview(content: string, values: VariableValues): LivePreview {
  return {
    preview: substituteVariables(content, values),
    missing: getMissingVariables(content, values),
  };
}

function blankVariable(name: string): Variable {
  return { name, type: "text", defaultValue: "", options: [] };
}

// -- Form generation --

interface BaseField {
  name: string;
  label: string;
}

export interface TextField extends BaseField {
  kind: "text";
  initial: string;
}

export interface TextareaField extends BaseField {
  kind: "textarea";
  initial: string;
}

export interface SelectField extends BaseField {
  kind: "select";
  options: string[];
  initial: string;
  error?: string;
}

export interface NumberField extends BaseField {
  kind: "number";
  initial: number;
}

export type FormField = TextField | TextareaField | SelectField | NumberField;

/**
 * Describes the input widget for each variable, in definition order.
 */
export function buildFormFields(variables: readonly Variable[]): FormField[] {
  return variables.map((variable): FormField => {
    const base = { name: variable.name, label: variable.name };
    switch (variable.type) {
      case "text":
        return { ...base, kind: "text", initial: variable.defaultValue };
      case "textarea":
        return { ...base, kind: "textarea", initial: variable.defaultValue };
      case "select":
        if (variable.options.length === 0) {
          return {
            ...base,
            kind: "select",
            options: [],
            initial: "",
            error: `Select variable '${variable.name}' has no options`,
          };
        }
        return {
          ...base,
          kind: "select",
          options: [...variable.options],
          initial: variable.options.includes(variable.defaultValue)
            ? variable.defaultValue
            : variable.options[0],
        };
      case "number":
        return { ...base, kind: "number", initial: parseNumber(variable.defaultValue) ?? 0 };
      default:
        return assertNever(variable.type);
    }
  });
}

/**
 * Value map a fresh form starts from.
 */
export function initialValues(variables: readonly Variable[]): Record<string, string> {
  const values: Record<string, string> = {};
  for (const field of buildFormFields(variables)) {
    if (field.kind === "select" && field.error) continue;
    values[field.name] = String(field.initial);
  }
  return values;
}

// -- Validation --

export interface VariableIssue {
  name: string;
  message: string;
}

/**
 * Reports definition problems. Never throws; an empty list means the set is usable.
 */
export function validateVariables(variables: readonly Variable[]): VariableIssue[] {
  const issues: VariableIssue[] = [];
  const seen = new Set<string>();

  for (const variable of variables) {
    const { name } = variable;
    if (!VARIABLE_NAME.test(name)) {
      issues.push({ name, message: `Invalid variable name: "${name}"` });
    }
    if (seen.has(name)) {
      issues.push({ name, message: `Duplicate variable: "${name}"` });
    }
    seen.add(name);

    if (variable.type === "select") {
      if (variable.options.length === 0) {
        issues.push({ name, message: `Select variable "${name}" has no options` });
      } else if (variable.defaultValue !== "" && !variable.options.includes(variable.defaultValue)) {
        issues.push({ name, message: `Default "${variable.defaultValue}" is not an option of "${name}"` });
      }
    }
    if (variable.type === "number" && variable.defaultValue !== "" && parseNumber(variable.defaultValue) === undefined) {
      issues.push({ name, message: `Default "${variable.defaultValue}" of "${name}" is not a number` });
    }
  }
  return issues;
}

export function isVariableType(value: string): value is VariableType {
  return value === "text" || value === "textarea" || value === "select" || value === "number";
}

function parseNumber(raw: string): number | undefined {
  if (raw.trim() === "") return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled variable type: ${String(value)}`);
}
