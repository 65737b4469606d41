import { z } from "zod";

export const AGE_GROUPS = [
  "18-24",
  "25-34",
  "35-44",
  "45-54",
  "55-64",
  "65+",
] as const;

export const REQUIRED_FIELDS = [
  "phoneNumber",
  "name",
  "neighborhood",
  "ageGroup",
  "votingFrequency",
  "engagement",
] as const;

export const SURVEY_SUBMISSION = z.object({
  phoneNumber: z.string().min(1),
  name: z.string().min(1),
  email: z.string().nullish(),
  neighborhood: z.string().min(1),
  ageGroup: z.string().min(1),
  votingFrequency: z.string().min(1),
  issues: z.array(z.string()).min(1),
  engagement: z.string().min(1),
  additionalComments: z.string().nullish(),
  timestamp: z.string().nullish(),
});

export type SurveySubmission = z.infer<typeof SURVEY_SUBMISSION>;

/** A submission after the server has filled in its timestamp. */
export type StampedSubmission = SurveySubmission & { timestamp: string };

export interface SurveyResponse {
  id: number;
  phoneNumber: string;
  name: string;
  email: string;
  neighborhood: string;
  ageGroup: string;
  votingFrequency: string;
  issues: string[];
  engagement: string;
  additionalComments: string;
  timestamp: string;
}

export type GroupableField = "neighborhood" | "ageGroup" | "votingFrequency";

export type SurveyStats = {
  total: number;
  by_neighborhood: Record<string, number>;
  by_age_group: Record<string, number>;
  by_voting_frequency: Record<string, number>;
};
