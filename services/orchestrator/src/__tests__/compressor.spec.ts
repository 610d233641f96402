import { describe, it, expect } from "vitest";
import {
  MIDDLE_MARKER,
  RESTATE_NOTE,
  capMessageCount,
  compressWithReport,
  safeTruncate,
  stripToolMetadata
} from "../context/compressor";
import { charEstimate } from "../context/tokens";
import type { ContentBlock, Message } from "../types";
import { message } from "./helpers/fixtures";

const summarySuffix = (id: string) => `... (truncated)\n\nmessage_id "${id}"\nUse expand-message tool to see contents`;

describe("compressWithReport", () => {
  it("leaves a conversation under budget untouched", () => {
    const input = [message("s", "system", "be brief"), message("u1", "user", "hello"), message("a1", "assistant", "hi")];
    const report = compressWithReport(input, { budget: 1000, estimate: charEstimate });

    expect(report.messages).toEqual(input);
    expect(report.rounds).toBe(0);
    expect(report.omitted).toBe(0);
    expect(report.tokensBefore).toBe(report.tokensAfter);
  });

  it("halves the threshold until older tool results are summarized and keeps the newest intact", () => {
    const input = [1, 2, 3, 4, 5, 6].map((n) => message(`tool-${n}`, "tool", "a".repeat(8000)));
    const report = compressWithReport(input, { budget: 5000, estimate: charEstimate });

    // thresholds 4096, 2048 change nothing; 1024 leaves 5935 tokens; 512 fits
    expect(report.rounds).toBe(4);
    expect(report.tokensBefore).toBe(12000);
    expect(report.tokensAfter).toBe(4015);
    expect(report.omitted).toBe(0);

    expect(report.messages[0].content).toBe("a".repeat(1536) + summarySuffix("tool-1"));
    expect(report.messages[0].metadata).toEqual({ toolResult: true, compressed: true });
    expect(report.messages[4].content).toBe("a".repeat(1536) + summarySuffix("tool-5"));
    expect(report.messages[5]).toEqual(input[5]);
  });

  it("does not mutate the input messages", () => {
    const input = [1, 2, 3].map((n) => message(`tool-${n}`, "tool", "a".repeat(8000)));
    const copy = structuredClone(input);
    compressWithReport(input, { budget: 2500, estimate: charEstimate });
    expect(input).toEqual(copy);
  });

  it("is stable when applied to its own output", () => {
    const input = [1, 2, 3, 4, 5, 6].map((n) => message(`tool-${n}`, "tool", "a".repeat(8000)));
    const first = compressWithReport(input, { budget: 5000, estimate: charEstimate });
    const second = compressWithReport(first.messages, { budget: 5000, estimate: charEstimate });

    expect(second.messages).toEqual(first.messages);
    expect(second.rounds).toBe(0);
  });

  it("safe-truncates the newest message of a role when it alone blows the budget", () => {
    const text = "a".repeat(6000) + "b".repeat(6000);
    const report = compressWithReport([message("u1", "user", text)], { budget: 1000, estimate: charEstimate });

    // ceiling is 2 x budget = 2000 chars, 150 reserved for markers
    expect(report.rounds).toBe(1);
    expect(report.messages[0].content).toBe("a".repeat(925) + MIDDLE_MARKER + "b".repeat(925) + RESTATE_NOTE);
    expect(report.messages[0].metadata).toEqual({ truncated: true });
  });

  it("keeps compressed tool results in the tool group so the newest user message stays exempt", () => {
    const toolBlocks = (id: string): ContentBlock[] => [
      { type: "tool_result", toolCallId: id, toolName: "read", output: "x".repeat(8000) }
    ];
    const input = [
      message("sys", "system", "sys"),
      message("u1", "user", "a".repeat(8000)),
      message("t1", "user", toolBlocks("c1")),
      message("t2", "user", toolBlocks("c2"))
    ];
    const report = compressWithReport(input, { budget: 1000, estimate: charEstimate });

    const [, user, olderTool, newestTool] = report.messages;
    expect(user.metadata).toEqual({ truncated: true });
    expect(user.content).toBe("a".repeat(925) + MIDDLE_MARKER + "a".repeat(925) + RESTATE_NOTE);
    expect(newestTool.metadata).toEqual({ toolResult: true, truncated: true });
    // threshold 256 in the last round: 3 x 256 chars of head
    expect(olderTool.content).toBe(JSON.stringify(toolBlocks("c1")).slice(0, 768) + summarySuffix("t1"));
    expect(olderTool.metadata).toEqual({ toolResult: true, compressed: true });
  });

  it("omits middle batches but never drops below the message floor", () => {
    const users = Array.from({ length: 30 }, (_, i) => message(`u${i}`, "user", "b".repeat(400)));
    const input = [message("sys", "system", "sys"), ...users];
    const report = compressWithReport(input, { budget: 1000, estimate: charEstimate });

    expect(report.rounds).toBe(5);
    expect(report.omitted).toBe(20);
    expect(report.messages.map((m) => m.id)).toEqual([
      "sys",
      ...Array.from({ length: 10 }, (_, i) => `u${20 + i}`)
    ]);
    // the floor wins over the budget
    expect(report.tokensAfter).toBe(1001);
  });

  it("caps the message count keeping equal head and tail slices", () => {
    const input = Array.from({ length: 330 }, (_, i) => message(`m${i}`, i % 2 === 0 ? "user" : "assistant", "hi"));
    const report = compressWithReport(input, { budget: 1_000_000, estimate: charEstimate });

    expect(report.messages).toHaveLength(320);
    expect(report.omitted).toBe(10);
    expect(report.messages[159].id).toBe("m159");
    expect(report.messages[160].id).toBe("m170");
    expect(report.messages[319].id).toBe("m329");
  });
});

describe("stripToolMetadata", () => {
  it("drops raw arguments from tool results and marks the omission", () => {
    const original: Message = message("t1", "tool", [
      { type: "tool_result", toolCallId: "call-1", toolName: "search", output: "3 results", arguments: { q: "weather" } }
    ]);
    const stripped = stripToolMetadata(original);

    expect(stripped.content).toEqual([
      { type: "tool_result", toolCallId: "call-1", toolName: "search", output: "3 results", argumentsOmitted: true }
    ]);
    expect(original.content).toEqual([
      { type: "tool_result", toolCallId: "call-1", toolName: "search", output: "3 results", arguments: { q: "weather" } }
    ]);
  });

  it("returns non-tool messages as they are", () => {
    const m = message("u1", "user", [{ type: "text", text: "hi" }]);
    expect(stripToolMetadata(m)).toBe(m);
  });
});

describe("safeTruncate", () => {
  it("keeps head and tail around the middle marker", () => {
    const m = message("a1", "assistant", "a".repeat(300) + "b".repeat(300));
    const out = safeTruncate(m, 400);
    expect(out.content).toBe("a".repeat(125) + MIDDLE_MARKER + "b".repeat(125) + RESTATE_NOTE);
  });

  it("returns short messages unchanged", () => {
    const m = message("a1", "assistant", "short");
    expect(safeTruncate(m, 400)).toBe(m);
  });
});

describe("capMessageCount", () => {
  it("is a no-op at or under the cap", () => {
    const input = [message("u1", "user", "x"), message("u2", "user", "y")];
    expect(capMessageCount(input, 2)).toBe(input);
  });
});
