/**
 * Tree Model
 *
 * A tree growing in a plot. Trees record the user who added them, so
 * roles can let contributors edit their own trees without editing
 * everyone's.
 */

import { defineModel } from "@arbor/contracts";

export const TreeModel = defineModel({
  name: "Tree",
  description: "A tree growing in a plot.",

  fields: [
    {
      name: "plotId",
      type: "string",
      description: "Plot",
    },
    {
      name: "speciesId",
      type: "string",
      description: "Species",
    },
    {
      name: "diameter",
      type: "float",
      description: "Trunk diameter",
    },
    {
      name: "height",
      type: "float",
      description: "Tree height",
    },
    {
      name: "canopyHeight",
      type: "float",
      description: "Canopy height",
    },
    {
      name: "datePlanted",
      type: "date",
      description: "Date planted",
    },
    {
      name: "dateRemoved",
      type: "date",
      description: "Date removed",
    },
    {
      name: "condition",
      type: "choice",
      description: "Condition",
      options: ["Excellent", "Good", "Fair", "Poor", "Dead"],
    },
    {
      name: "createdBy",
      type: "string",
      description: "Added by",
    },
  ],

  ownership: { field: "createdBy" },
});
