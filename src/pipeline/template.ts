/**
 * Prompt templates
 * `{{topic}}` is the research topic; `{{<task-id>}}` is the JSON payload of
 * an earlier task in the same run.
 */

import { ConfigError } from "../core/errors.js";

const PLACEHOLDER = /\{\{\s*([a-z0-9][a-z0-9-]*)\s*\}\}/gi;

export const TOPIC_PLACEHOLDER = "topic";

/**
 * Names referenced by a template, in order of first appearance
 */
export function listPlaceholders(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER)) {
    const name = match[1];
    if (name && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

/**
 * Fill every placeholder. A placeholder without a value is a ConfigError.
 */
export function renderTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => {
    if (!Object.hasOwn(values, name)) {
      throw new ConfigError(`Template references unknown value '${name}'`, { placeholder: name });
    }
    return values[name];
  });
}
