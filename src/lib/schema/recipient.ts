import { z } from "zod";

export const RECIPIENT = z.object({
  phone: z.string().nullish(),
  name: z.string().nullish(),
});

export const RECIPIENTS = z.array(RECIPIENT);

export type Recipient = z.infer<typeof RECIPIENT>;
