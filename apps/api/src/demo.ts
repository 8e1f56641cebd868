/**
 * Demo Instance
 *
 * A small instance to try the API against: the role templates, a few
 * users with assignments, photo uploads on.
 */

import { INSTANCE_FEATURES, type Instance } from "@arbor/contracts";
import type { RoleAdministration } from "@arbor/platform";
import { roleTemplates } from "@arbor/domain";

export const DEMO_INSTANCE_ID = "00000000-0000-0000-0000-000000000001";

export const DEMO_INSTANCE: Instance = {
  id: DEMO_INSTANCE_ID,
  name: "Demo City",
  urlName: "demo",
  features: [INSTANCE_FEATURES.PHOTO_UPLOADS],
  userDefinedFields: [
    { modelType: "Tree", name: "Stewardship", type: "choice", choices: ["Watered", "Mulched", "Pruned"] },
  ],
};

/** Demo users by the template whose role they get. Unlisted users get the default role. */
export const DEMO_ASSIGNMENTS: Record<string, string> = {
  "demo-admin": "Administrator",
  "demo-contributor": "Contributor",
};

export interface DemoSeedResult {
  instance: Instance;
  roleIds: Record<string, string>;
}

/**
 * Creates the demo instance with its roles and assignments.
 * Only meant for an empty store.
 */
export async function seedDemoInstance(admin: RoleAdministration): Promise<DemoSeedResult> {
  const instance = await admin.saveInstance(DEMO_INSTANCE);

  const roleIds: Record<string, string> = {};
  for (const template of roleTemplates) {
    const role = await admin.createRole(instance.id, template);
    roleIds[role.name] = role.id;
  }

  for (const [userId, roleName] of Object.entries(DEMO_ASSIGNMENTS)) {
    const roleId = roleIds[roleName];
    if (roleId === undefined) {
      throw new Error(`Demo assignment names unknown role template "${roleName}"`);
    }
    await admin.assignRole(userId, instance.id, roleId);
  }

  return { instance, roleIds };
}
