/**
 * TreePhoto Model
 *
 * A photo of a tree. Uploading is an optional instance feature; while it
 * is off, existing photos stay readable but none can be added or changed.
 */

import { defineModel, INSTANCE_FEATURES } from "@arbor/contracts";

export const TreePhotoModel = defineModel({
  name: "TreePhoto",
  description: "A photo of a tree.",

  fields: [
    {
      name: "treeId",
      type: "string",
      description: "Tree",
    },
    {
      name: "image",
      type: "string",
      description: "Image",
    },
    {
      name: "caption",
      type: "string",
      description: "Caption",
    },
    {
      name: "createdBy",
      type: "string",
      description: "Uploaded by",
    },
  ],

  ownership: { field: "createdBy" },
  requiresFeature: INSTANCE_FEATURES.PHOTO_UPLOADS,
});
