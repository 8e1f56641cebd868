/**
 * Plot Model
 *
 * A planting site: a tree pit, a lawn strip, an open bed. A plot exists
 * whether or not a tree currently grows in it, and is maintained by the
 * instance as a whole, so it has no owner.
 */

import { defineModel } from "@arbor/contracts";

export const PlotModel = defineModel({
  name: "Plot",
  description: "A planting site that may or may not hold a tree.",

  fields: [
    {
      name: "geom",
      type: "geometry",
      description: "Location",
    },
    {
      name: "width",
      type: "float",
      description: "Plot width",
    },
    {
      name: "length",
      type: "float",
      description: "Plot length",
    },
    {
      name: "addressStreet",
      type: "string",
      description: "Street address",
    },
    {
      name: "addressCity",
      type: "string",
      description: "City",
    },
    {
      name: "addressZip",
      type: "string",
      description: "Postal code",
    },
    {
      name: "ownerOrigId",
      type: "string",
      description: "Custom ID",
    },
    {
      name: "readonly",
      type: "bool",
      description: "Locked",
      defaultValue: false,
    },
  ],
});
