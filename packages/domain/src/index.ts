/**
 * @arbor/domain
 *
 * The map models, the role templates new instances start with, and the
 * event subscribers. The API server imports this to register everything
 * with the platform.
 */

import type { ModelDefinition } from "@arbor/contracts";
import { PlotModel } from "./models/plot/plot.model.js";
import { TreeModel } from "./models/tree/tree.model.js";
import { TreePhotoModel } from "./models/tree-photo/tree-photo.model.js";
import { SpeciesModel } from "./models/species/species.model.js";

export { eventSubscribers } from "./subscribers/index.js";
export { roleTemplates, findRoleTemplate, loadRoleTemplates } from "./roles/role-templates.js";
export { PlotModel, TreeModel, TreePhotoModel, SpeciesModel };

/** All models of the map domain. */
export const models: ModelDefinition[] = [PlotModel, TreeModel, TreePhotoModel, SpeciesModel];
