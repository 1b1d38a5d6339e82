import { ResponseShape, decodeStructured, isUuid, readString, requiredField } from "../structuredDecoder";

export type JobRecommendationResponse = Readonly<{
  recommendedJobId: string;
  reason: string;
}>;

const FIELDS = {
  recommendedJobId: requiredField(
    "recommendedJobId",
    ["recommendedJobId", "recommended_job_id", "jobId"],
    readString
  ),
  reason: requiredField("reason", ["reason", "rationale"], readString)
};

export const jobRecommendationShape: ResponseShape<JobRecommendationResponse> = {
  name: "JobRecommendationResponse",
  build: (source) =>
    Object.freeze({
      recommendedJobId: source.get(FIELDS.recommendedJobId),
      reason: source.get(FIELDS.reason)
    }),
  validate: (response) => {
    const problems: string[] = [];
    if (!isUuid(response.recommendedJobId)) {
      problems.push(`invalid job id "${response.recommendedJobId}"`);
    }
    if (!response.reason.trim()) {
      problems.push("empty reason");
    }
    return problems;
  }
};

export function decodeJobRecommendation(text: string): JobRecommendationResponse {
  return decodeStructured(text, jobRecommendationShape);
}
