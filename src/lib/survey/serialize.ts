import type { SurveyResponse } from "@/lib/schema/survey";

/** A response keyed by its storage column names, as the API returns it. */
export type StoredResponseJson = {
  id: number;
  phone_number: string;
  name: string;
  email: string;
  neighborhood: string;
  age_group: string;
  voting_frequency: string;
  issues: string[];
  engagement: string;
  additional_comments: string;
  timestamp: string;
};

export function toStoredJson(r: SurveyResponse): StoredResponseJson {
  return {
    id: r.id,
    phone_number: r.phoneNumber,
    name: r.name,
    email: r.email,
    neighborhood: r.neighborhood,
    age_group: r.ageGroup,
    voting_frequency: r.votingFrequency,
    issues: r.issues,
    engagement: r.engagement,
    additional_comments: r.additionalComments,
    timestamp: r.timestamp,
  };
}
