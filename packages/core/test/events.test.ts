import { describe, it, expect, vi } from "vitest";
import { renderEvent, renderEvents } from "../src/events.js";
import { createColors } from "../src/format.js";
import { nullResolver } from "../src/selector-resolver.js";
import { FOO, UNKNOWN, makeDirectory } from "./helpers.js";

const TOPIC_A = "0x" + "11".repeat(32);
const TOPIC_B = "0x" + "22".repeat(32);

const plain = createColors(false);
const colored = createColors(true);

describe("renderEvent", () => {
  it("highlights a popular emitter and joins raw topics", async () => {
    const line = await renderEvent(
      { address: FOO, indexedTopics: [TOPIC_A, TOPIC_B] },
      { directory: makeDirectory(), resolver: nullResolver, resolveHashes: true, colors: colored }
    );
    expect(line).toBe(
      "\x1b[32mFoo\x1b[39m" + " ".repeat(39) + " " + `${TOPIC_A}, ${TOPIC_B}`
    );
  });

  it("falls back to the raw address in blue", async () => {
    const line = await renderEvent(
      { address: UNKNOWN, indexedTopics: [TOPIC_A] },
      { directory: makeDirectory(), resolver: nullResolver, resolveHashes: false, colors: colored }
    );
    expect(line).toBe(`\x1b[34m${UNKNOWN}\x1b[39m ${TOPIC_A}`);
  });

  it("renders an event without topics", async () => {
    const line = await renderEvent(
      { address: UNKNOWN, indexedTopics: [] },
      { directory: makeDirectory(), resolver: nullResolver, resolveHashes: false, colors: plain }
    );
    expect(line).toBe(`${UNKNOWN} `);
  });

  it("resolves topics in order", async () => {
    const resolveEventSelector = vi.fn(async (topic: string) =>
      topic === TOPIC_A ? "Transfer(address,address,uint256)" : undefined
    );
    const resolver = { resolveFunctionSelector: vi.fn(async () => undefined), resolveEventSelector };

    const line = await renderEvent(
      { address: UNKNOWN, indexedTopics: [TOPIC_A, TOPIC_B] },
      { directory: makeDirectory(), resolver, resolveHashes: true, colors: plain }
    );

    expect(line).toBe(`${UNKNOWN} Transfer(address,address,uint256), ${TOPIC_B}`);
    expect(resolveEventSelector.mock.calls.map(([topic]) => topic)).toEqual([TOPIC_A, TOPIC_B]);
  });

  it("makes no resolver calls when resolution is disabled", async () => {
    const resolveEventSelector = vi.fn(async (_topic: string) => "Never()");
    const resolver = { resolveFunctionSelector: vi.fn(async () => undefined), resolveEventSelector };

    const line = await renderEvent(
      { address: FOO, indexedTopics: [TOPIC_A] },
      { directory: makeDirectory(), resolver, resolveHashes: false, colors: plain }
    );

    expect(line).toBe("Foo" + " ".repeat(39) + " " + TOPIC_A);
    expect(resolveEventSelector).not.toHaveBeenCalled();
  });
});

describe("renderEvents", () => {
  it("emits one line per event", async () => {
    const lines = await renderEvents(
      [
        { address: FOO, indexedTopics: [TOPIC_A] },
        { address: UNKNOWN, indexedTopics: [TOPIC_B] },
      ],
      { directory: makeDirectory(), resolver: nullResolver, resolveHashes: false, colors: plain }
    );
    expect(lines).toEqual([
      "Foo" + " ".repeat(39) + " " + TOPIC_A,
      `${UNKNOWN} ${TOPIC_B}`,
    ]);
  });
});
