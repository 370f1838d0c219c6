// Basic Agent Streaming Example
// Run: npx tsx examples/01-basic-streaming.ts
//
// Uses a scripted agent so it runs without credentials.

import { AgentStream, type AgentEvent } from "../src";

async function scriptedAgent(
  prompt: string,
  onEvent: (event: AgentEvent) => void,
): Promise<unknown> {
  const chunks = [
    "<thinking>The user wants a sum. ",
    "Use the calculator.</thinking>",
    "Let me check. ",
  ];
  for (const chunk of chunks) {
    onEvent({ data: chunk });
    await new Promise((resolve) => setTimeout(resolve, 50));
  }

  onEvent({
    current_tool_use: { toolUseId: "t1", name: "calculator", input: { a: 2, b: 2 } },
  });
  await new Promise((resolve) => setTimeout(resolve, 50));
  onEvent({ tool_result: { toolUseId: "t1", output: "4" } });

  onEvent({ data: `For "${prompt}": 2 + 2 = 4.` });
  return { message: { role: "assistant", content: "Let me check. 2 + 2 = 4." } };
}

async function main() {
  console.log("=== Basic Agent Streaming Example ===\n");

  const agent = new AgentStream(scriptedAgent, { deadlineMs: 10_000 });

  let printed = 0;
  const message = await agent.run("what is 2 + 2?", ({ kind, partial }) => {
    process.stdout.write(partial.text.slice(printed));
    printed = partial.text.length;
    if (kind === "current_tool_use") {
      console.log("\n[tool started]");
    }
  });

  console.log("\n\n--- Final message ---");
  console.log("Text:", message.text);
  console.log("Hidden:", message.hiddenText);
  console.log(
    "Tools:",
    message.toolCalls.map((t) => `${t.name}(${JSON.stringify(t.input)}) = ${String(t.result)}`),
  );
  console.log("Force stopped:", message.forceStopped);
}

main().catch(console.error);
