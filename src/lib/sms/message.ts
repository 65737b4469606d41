export function composeMessage(surveyUrl: string, name?: string | null): string {
  const greeting = name ? `Hello ${name}!` : "Hello!";
  return [
    greeting,
    "You're invited to participate in the District 5 Voter Survey for Hyde Park, Mattapan, and Readville.",
    "Your voice matters! Share your thoughts on important community issues.",
    `Complete the survey here: ${surveyUrl}`,
    "Thank you for your participation!",
  ].join("\n\n");
}
