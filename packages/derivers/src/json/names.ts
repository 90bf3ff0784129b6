/**
 * JSON names of fields and tags
 *
 *   /** @key first_name *\/ firstName: string
 *   | /** @name circle *\/ { kind: "Circle"; args: [number] }
 */

import {
  getAttribute,
  type Attributes,
  type Label,
  type RecordField,
} from "@shapegen/frontend";

export const KEY_ATTRIBUTE = "key";
export const NAME_ATTRIBUTE = "name";

export const jsonKey = (field: RecordField): string =>
  getAttribute(field.attrs, KEY_ATTRIBUTE) ?? field.name.txt;

export const jsonTagName = (name: Label, attrs: Attributes): string =>
  getAttribute(attrs, NAME_ATTRIBUTE) ?? name.txt;
