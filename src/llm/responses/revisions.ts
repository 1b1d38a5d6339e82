import {
  FieldSource,
  ResponseShape,
  decodeStructured,
  optionalField,
  readArrayOf,
  readBoolean,
  readString,
  requiredField
} from "../structuredDecoder";

export type ProposedRevision = Readonly<{
  id: string;
  oldValue: string;
  newValue: string;
  valueChanged: boolean;
  isTitleNode: boolean;
  why: string;
  /** Hierarchical hint used when an id match is ambiguous. */
  treePath: string;
}>;

export type RevisionsResponse = Readonly<{
  revArray: readonly ProposedRevision[];
}>;

const SHAPE_NAME = "RevisionsResponse";

const REVISION_FIELDS = {
  id: requiredField("id", ["id"], readString),
  oldValue: requiredField("oldValue", ["oldValue", "old_value"], readString),
  newValue: requiredField("newValue", ["newValue", "new_value"], readString),
  valueChanged: optionalField("valueChanged", ["valueChanged", "value_changed"], readBoolean, false),
  isTitleNode: optionalField("isTitleNode", ["isTitleNode", "is_title_node"], readBoolean, false),
  why: optionalField("why", ["why", "reason"], readString, ""),
  treePath: optionalField("treePath", ["treePath", "tree_path"], readString, "")
};

function buildRevision(source: FieldSource): ProposedRevision {
  return Object.freeze({
    id: source.get(REVISION_FIELDS.id),
    oldValue: source.get(REVISION_FIELDS.oldValue),
    newValue: source.get(REVISION_FIELDS.newValue),
    valueChanged: source.get(REVISION_FIELDS.valueChanged),
    isTitleNode: source.get(REVISION_FIELDS.isTitleNode),
    why: source.get(REVISION_FIELDS.why),
    treePath: source.get(REVISION_FIELDS.treePath)
  });
}

const REVISIONS_FIELD = requiredField("revArray", ["revArray", "RevArray"], readArrayOf(SHAPE_NAME, buildRevision));

export const revisionsShape: ResponseShape<RevisionsResponse> = {
  name: SHAPE_NAME,
  envelope: "revArray",
  build: (source) => Object.freeze({ revArray: source.get(REVISIONS_FIELD) }),
  validate: (response) => {
    if (response.revArray.length === 0) {
      return ["no revisions returned"];
    }
    return response.revArray.flatMap((revision, index) =>
      revision.id.trim() ? [] : [`revision ${index} has an empty id`]
    );
  }
};

export function decodeRevisions(text: string): RevisionsResponse {
  return decodeStructured(text, revisionsShape);
}
