import {
  FieldSource,
  ResponseShape,
  decodeStructured,
  isUuid,
  optionalField,
  readArrayOf,
  readString,
  readStringArray,
  requiredField
} from "../structuredDecoder";

export type DuplicateGroup = Readonly<{
  canonicalName: string;
  skillIds: readonly string[];
  reasoning: string;
}>;

export type SkillDeduplicationResponse = Readonly<{
  duplicateGroups: readonly DuplicateGroup[];
}>;

const SHAPE_NAME = "SkillDeduplicationResponse";
const ENVELOPE = "duplicate_groups";

const GROUP_FIELDS = {
  canonicalName: requiredField("canonicalName", ["canonicalName", "canonical_name"], readString),
  skillIds: requiredField("skillIds", ["skillIds", "skill_ids"], readStringArray),
  reasoning: optionalField("reasoning", ["reasoning", "reason"], readString, "")
};

function buildGroup(source: FieldSource): DuplicateGroup {
  return Object.freeze({
    canonicalName: source.get(GROUP_FIELDS.canonicalName),
    skillIds: source.get(GROUP_FIELDS.skillIds),
    reasoning: source.get(GROUP_FIELDS.reasoning)
  });
}

const GROUPS_FIELD = requiredField(
  "duplicateGroups",
  [ENVELOPE, "duplicateGroups"],
  readArrayOf(SHAPE_NAME, buildGroup)
);

// An empty list is a valid answer: nothing to merge.
export function validateSkillDeduplication(response: SkillDeduplicationResponse): string[] {
  const problems: string[] = [];
  const owner = new Map<string, number>();

  response.duplicateGroups.forEach((group, index) => {
    if (!group.canonicalName.trim()) {
      problems.push(`group ${index} has an empty canonical name`);
    }
    if (group.skillIds.length < 2) {
      problems.push(`group ${index} lists fewer than 2 skills`);
    }
    for (const id of group.skillIds) {
      if (!isUuid(id)) {
        problems.push(`group ${index} has invalid id "${id}"`);
        continue;
      }
      const key = id.toLowerCase();
      const previous = owner.get(key);
      if (previous !== undefined && previous !== index) {
        problems.push(`id "${id}" appears in groups ${previous} and ${index}`);
      }
      owner.set(key, index);
    }
  });
  return problems;
}

export const skillDeduplicationShape: ResponseShape<SkillDeduplicationResponse> = {
  name: SHAPE_NAME,
  envelope: ENVELOPE,
  build: (source) => Object.freeze({ duplicateGroups: source.get(GROUPS_FIELD) }),
  validate: validateSkillDeduplication
};

export function decodeSkillDeduplication(text: string): SkillDeduplicationResponse {
  return decodeStructured(text, skillDeduplicationShape);
}
