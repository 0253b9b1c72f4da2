import { z } from "zod";

export const LIVE_RELOAD_ENDPOINT = "/__livereload";

const startEvent = z.object({ type: z.literal("start") }).strict();
const notifyEvent = z.object({ type: z.literal("notify"), message: z.string(), error: z.boolean() }).strict();
const reloadEvent = z.object({ type: z.literal("reload"), href: z.string().optional() }).strict();

export const reloadEventSchema = z.discriminatedUnion("type", [startEvent, notifyEvent, reloadEvent]);

export type ReloadEvent = z.infer<typeof reloadEventSchema>;

export function encodeReloadEvent(event: ReloadEvent): string {
  return JSON.stringify(event);
}

/** Parse one text frame; anything but a well-formed event is null */
export function parseReloadEvent(frame: string): ReloadEvent | null {
  let raw: unknown;
  try {
    raw = JSON.parse(frame);
  } catch {
    return null;
  }
  const result = reloadEventSchema.safeParse(raw);
  return result.success ? result.data : null;
}
