/**
 * Field Types
 *
 * The data types a model field or user-defined field can hold.
 * Field descriptors report these so edit forms can pick an input widget.
 */

import { z } from "zod";

export const FIELD_TYPES = [
  "int",
  "float",
  "string",
  "date",
  "bool",
  "choice",
  "geometry",
] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

export const fieldTypeSchema = z.enum(FIELD_TYPES);
