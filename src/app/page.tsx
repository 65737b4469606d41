"use client";

import { type FormEvent, useState } from "react";
import { z } from "zod";
import { AGE_GROUPS, type SurveySubmission } from "@/lib/schema/survey";
import {
  ENGAGEMENT_LEVELS,
  ISSUES,
  NEIGHBORHOODS,
  VOTING_FREQUENCIES,
} from "@/lib/survey/options";

type FormState = Omit<
  SurveySubmission,
  "timestamp" | "email" | "additionalComments"
> & {
  email: string;
  additionalComments: string;
};

const EMPTY_FORM: FormState = {
  phoneNumber: "",
  name: "",
  email: "",
  neighborhood: "",
  ageGroup: "",
  votingFrequency: "",
  issues: [],
  engagement: "",
  additionalComments: "",
};

type Status =
  | { state: "idle" }
  | { state: "submitting" }
  | { state: "saved"; id: number }
  | { state: "error"; message: string };

const SUBMIT_RESULT = z.object({
  id: z.number().optional(),
  error: z.string().optional(),
});

async function submitSurvey(form: FormState): Promise<Status> {
  const res = await fetch("/api/submit-survey", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ ...form, timestamp: new Date().toISOString() }),
  });
  const parsed = SUBMIT_RESULT.safeParse(await res.json().catch(() => null));
  const body = parsed.success ? parsed.data : {};
  if (!res.ok || body.id === undefined) {
    return { state: "error", message: body.error ?? "Something went wrong." };
  }
  return { state: "saved", id: body.id };
}

// ---------------------------------------------------------------------------
// Field helpers
// ---------------------------------------------------------------------------

interface ChoiceProps {
  label: string;
  name: keyof FormState;
  options: readonly string[];
  value: string;
  onChange: (value: string) => void;
}

function RadioGroup({ label, name, options, value, onChange }: ChoiceProps) {
  return (
    <fieldset>
      <legend>{label}</legend>
      {options.map((option) => (
        <label key={option}>
          <input
            type="radio"
            name={name}
            value={option}
            checked={value === option}
            onChange={() => onChange(option)}
          />
          {option}
        </label>
      ))}
    </fieldset>
  );
}

function Select({ label, name, options, value, onChange }: ChoiceProps) {
  return (
    <div>
      <label htmlFor={name}>{label}</label>
      <select
        id={name}
        name={name}
        value={value}
        onChange={(e) => onChange(e.target.value)}
      >
        <option value="">Select…</option>
        {options.map((option) => (
          <option key={option} value={option}>
            {option}
          </option>
        ))}
      </select>
    </div>
  );
}

// ---------------------------------------------------------------------------
// Page
// ---------------------------------------------------------------------------

export default function SurveyPage() {
  const [form, setForm] = useState<FormState>(EMPTY_FORM);
  const [status, setStatus] = useState<Status>({ state: "idle" });

  function update<K extends keyof FormState>(key: K, value: FormState[K]) {
    setForm((f) => ({ ...f, [key]: value }));
  }

  function toggleIssue(issue: string) {
    setForm((f) => ({
      ...f,
      issues: f.issues.includes(issue)
        ? f.issues.filter((i) => i !== issue)
        : [...f.issues, issue],
    }));
  }

  async function handleSubmit(e: FormEvent) {
    e.preventDefault();
    if (form.issues.length === 0) {
      setStatus({
        state: "error",
        message: "Please select at least one issue.",
      });
      return;
    }
    setStatus({ state: "submitting" });
    try {
      setStatus(await submitSurvey(form));
    } catch {
      setStatus({ state: "error", message: "Could not reach the server." });
    }
  }

  if (status.state === "saved") {
    return (
      <main>
        <h1>Thank you!</h1>
        <p>Your response has been recorded.</p>
      </main>
    );
  }

  return (
    <main>
      <h1>District 5 Voter Survey</h1>
      <p>Hyde Park, Mattapan and Readville</p>

      <form onSubmit={handleSubmit}>
        <label htmlFor="name">Name</label>
        <input
          id="name"
          required
          value={form.name}
          onChange={(e) => update("name", e.target.value)}
        />
        <label htmlFor="phoneNumber">Phone number</label>
        <input
          id="phoneNumber"
          required
          type="tel"
          value={form.phoneNumber}
          onChange={(e) => update("phoneNumber", e.target.value)}
        />
        <label htmlFor="email">Email (optional)</label>
        <input
          id="email"
          type="email"
          value={form.email}
          onChange={(e) => update("email", e.target.value)}
        />

        <Select
          label="Neighborhood"
          name="neighborhood"
          options={NEIGHBORHOODS}
          value={form.neighborhood}
          onChange={(v) => update("neighborhood", v)}
        />
        <Select
          label="Age group"
          name="ageGroup"
          options={AGE_GROUPS}
          value={form.ageGroup}
          onChange={(v) => update("ageGroup", v)}
        />
        <RadioGroup
          label="How often do you vote?"
          name="votingFrequency"
          options={VOTING_FREQUENCIES}
          value={form.votingFrequency}
          onChange={(v) => update("votingFrequency", v)}
        />

        <fieldset>
          <legend>Which issues matter most to you?</legend>
          {ISSUES.map((issue) => (
            <label key={issue}>
              <input
                type="checkbox"
                checked={form.issues.includes(issue)}
                onChange={() => toggleIssue(issue)}
              />
              {issue}
            </label>
          ))}
        </fieldset>

        <RadioGroup
          label="How would you like to stay involved?"
          name="engagement"
          options={ENGAGEMENT_LEVELS}
          value={form.engagement}
          onChange={(v) => update("engagement", v)}
        />

        <label htmlFor="additionalComments">Additional comments</label>
        <textarea
          id="additionalComments"
          value={form.additionalComments}
          onChange={(e) => update("additionalComments", e.target.value)}
        />

        {status.state === "error" && <p role="alert">{status.message}</p>}

        <button type="submit" disabled={status.state === "submitting"}>
          {status.state === "submitting" ? "Submitting…" : "Submit survey"}
        </button>
      </form>
    </main>
  );
}
