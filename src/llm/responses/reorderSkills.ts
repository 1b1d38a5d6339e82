import {
  FieldSource,
  ResponseShape,
  decodeStructured,
  isUuid,
  optionalField,
  readArrayOf,
  readBoolean,
  readInteger,
  readString,
  requiredField
} from "../structuredDecoder";

export type ReorderedSkillNode = Readonly<{
  id: string;
  originalValue: string;
  /** 0-based position, most relevant first. */
  newPosition: number;
  reasonForReordering: string;
  isTitleNode: boolean;
}>;

export type ReorderSkillsResponse = Readonly<{
  reorderedSkillsAndExpertise: readonly ReorderedSkillNode[];
}>;

const SHAPE_NAME = "ReorderSkillsResponse";
const ENVELOPE = "reordered_skills_and_expertise";

const NODE_FIELDS = {
  id: requiredField("id", ["id"], readString),
  originalValue: requiredField("originalValue", ["originalValue", "original_value"], readString),
  newPosition: requiredField(
    "newPosition",
    ["newPosition", "recommendedPosition", "new_position", "recommended_position"],
    readInteger
  ),
  reasonForReordering: requiredField(
    "reasonForReordering",
    ["reasonForReordering", "reason", "reason_for_reordering"],
    readString
  ),
  isTitleNode: optionalField("isTitleNode", ["isTitleNode", "is_title_node"], readBoolean, false)
};

function buildNode(source: FieldSource): ReorderedSkillNode {
  return Object.freeze({
    id: source.get(NODE_FIELDS.id),
    originalValue: source.get(NODE_FIELDS.originalValue),
    newPosition: source.get(NODE_FIELDS.newPosition),
    reasonForReordering: source.get(NODE_FIELDS.reasonForReordering),
    isTitleNode: source.get(NODE_FIELDS.isTitleNode)
  });
}

const NODES_FIELD = requiredField(
  "reorderedSkillsAndExpertise",
  [ENVELOPE, "reorderedSkillsAndExpertise"],
  readArrayOf(SHAPE_NAME, buildNode)
);

export function validateReorderSkills(response: ReorderSkillsResponse): string[] {
  const nodes = response.reorderedSkillsAndExpertise;
  if (nodes.length === 0) {
    return ["no skills returned"];
  }

  const problems: string[] = [];
  const seen = new Set<string>();
  nodes.forEach((node, index) => {
    if (!isUuid(node.id)) {
      problems.push(`invalid id "${node.id}" at index ${index}`);
    } else if (seen.has(node.id.toLowerCase())) {
      problems.push(`duplicate id "${node.id}"`);
    }
    seen.add(node.id.toLowerCase());
    if (node.newPosition < 0) {
      problems.push(`negative position ${node.newPosition} for "${node.id}"`);
    }
  });
  return problems;
}

export const reorderSkillsShape: ResponseShape<ReorderSkillsResponse> = {
  name: SHAPE_NAME,
  envelope: ENVELOPE,
  build: (source) => Object.freeze({ reorderedSkillsAndExpertise: source.get(NODES_FIELD) }),
  validate: validateReorderSkills
};

export function decodeReorderSkills(text: string): ReorderSkillsResponse {
  return decodeStructured(text, reorderSkillsShape);
}

/** Nodes sorted by their recommended position. */
export function orderedNodes(response: ReorderSkillsResponse): ReorderedSkillNode[] {
  return [...response.reorderedSkillsAndExpertise].sort((a, b) => a.newPosition - b.newPosition);
}
