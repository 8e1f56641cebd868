/**
 * Role Templates
 *
 * The roles a new instance starts with. Administrators adjust them per
 * instance afterwards; templates are only read when seeding.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { newRoleSchema, type NewRole } from "@arbor/contracts";

const templateFile = new URL("./role-templates.json", import.meta.url);

/** Parses the bundled templates, failing loudly if the file is malformed. */
export function loadRoleTemplates(path: URL = templateFile): NewRole[] {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  return z.array(newRoleSchema).parse(raw);
}

export const roleTemplates: readonly NewRole[] = loadRoleTemplates();

export function findRoleTemplate(name: string): NewRole | undefined {
  const wanted = name.toLowerCase();
  return roleTemplates.find((template) => template.name.toLowerCase() === wanted);
}
