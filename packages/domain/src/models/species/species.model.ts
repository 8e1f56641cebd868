/**
 * Species Model
 *
 * The instance's species list. Most instances use a curated list;
 * editing it is an optional feature.
 */

import { defineModel, INSTANCE_FEATURES } from "@arbor/contracts";

export const SpeciesModel = defineModel({
  name: "Species",
  description: "A tree species in the instance's species list.",

  fields: [
    { name: "commonName", type: "string", description: "Common name" },
    { name: "genus", type: "string", description: "Genus" },
    { name: "species", type: "string", description: "Species" },
    { name: "cultivar", type: "string", description: "Cultivar" },
    { name: "isNative", type: "bool", description: "Native to the region", defaultValue: false },
    { name: "maxHeight", type: "int", description: "Maximum height" },
  ],

  requiresFeature: INSTANCE_FEATURES.SPECIES_EDITING,
});
