export const NEIGHBORHOODS = ["Hyde Park", "Mattapan", "Readville", "Other"];

export const VOTING_FREQUENCIES = [
  "Every election",
  "Most elections",
  "Only major elections",
  "Rarely",
  "This will be my first time",
];

export const ISSUES = [
  "Public safety",
  "Housing affordability",
  "Education",
  "Transportation",
  "Economic development",
  "Parks and open space",
  "Climate resilience",
  "Health care access",
];

export const ENGAGEMENT_LEVELS = [
  "I'd like to volunteer",
  "Keep me informed",
  "Just sharing my views",
];
