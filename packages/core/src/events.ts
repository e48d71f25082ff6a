import type { EventRecord } from "./types.js";
import type { RenderContext } from "./call-trace.js";
import { padVisible, defaultColors } from "./format.js";

const ADDRESS_WIDTH = 42;

async function formatTopic(topic: string, ctx: RenderContext): Promise<string> {
  if (!ctx.resolveHashes) return topic;
  return (await ctx.resolver.resolveEventSelector(topic)) ?? topic;
}

/** `<emitter> <topic>, <topic>, ...` */
export async function renderEvent(event: EventRecord, ctx: RenderContext): Promise<string> {
  const colors = ctx.colors ?? defaultColors;
  const label =
    ctx.directory.knownName(event.address, colors) ?? colors.blue(event.address);

  // Topics are resolved one at a time, in order.
  const topics: string[] = [];
  for (const topic of event.indexedTopics) {
    topics.push(await formatTopic(topic, ctx));
  }

  return `${padVisible(label, ADDRESS_WIDTH)} ${topics.join(", ")}`;
}

export async function renderEvents(
  events: readonly EventRecord[],
  ctx: RenderContext
): Promise<string[]> {
  const lines: string[] = [];
  for (const event of events) {
    lines.push(await renderEvent(event, ctx));
  }
  return lines;
}
