/**
 * templateResolver: {{variable}} substitution for configured form values.
 *
 * Batch names, titles and descriptions may reference run variables such as
 * {{folderName}} or {{batchId}}.
 */

import type { RunContext } from './types';

export type TemplateVars = Record<string, string>;

/**
 * Replace every {{key}} in `template` with its value from `data`.
 * Unknown variables are left as-is.
 */
export function resolveTemplate(template: string, data: TemplateVars): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match: string, key: string) => {
    return Object.prototype.hasOwnProperty.call(data, key) ? data[key] : match;
  });
}

/** Variables a folder's run exposes to templates. */
export function templateVarsFor(ctx: RunContext): TemplateVars {
  const vars: TemplateVars = {
    folderName: ctx.folderName,
    folderPath: ctx.folder,
    imageCount: String(ctx.images.length),
  };
  if (ctx.batchId !== null) vars.batchId = ctx.batchId;
  return vars;
}
