import { z } from "zod";
import type { ToolExecutor } from "./executor.js";

const parameters = z.object({
  timezone: z
    .string()
    .optional()
    .describe('IANA timezone string (e.g. "Asia/Kolkata", "Europe/London"). Defaults to "UTC".'),
});

export function registerGetCurrentTime(
  executor: ToolExecutor,
  now: () => Date = () => new Date(),
): void {
  executor.register(
    {
      name: "get_current_time",
      description:
        'Get the current date and time. Optionally specify an IANA timezone (e.g. "Asia/Kolkata", "America/New_York"). Defaults to UTC.',
      parameters,
      permission: "read",
      topics: ["time", "date", "today", "now", "clock", "timezone", "day", "week"],
    },
    async ({ timezone = "UTC" }) => {
      const date = now();
      // toLocaleString throws RangeError on an unknown zone
      const formatted = date.toLocaleString("en-US", {
        timeZone: timezone,
        dateStyle: "full",
        timeStyle: "long",
      });
      return { time: formatted, timezone, iso: date.toISOString() };
    },
  );
}
