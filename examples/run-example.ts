/**
 * Example: streaming a response and answering a tool call.
 *
 * Usage:
 *   OPENROUTER_API_KEY=... npx tsx examples/run-example.ts [model]
 */

import { z } from "zod";
import {
  Responder,
  EventType,
  createFunctionCallOutput,
  createUserMessage,
  functionTool,
  toInputItems,
  type InputItem,
} from "@responder/client";

const WeatherArgs = z.object({ city: z.string() });

const weatherTool = functionTool({
  name: "get_weather",
  description: "Get the current temperature for a city",
  parameters: WeatherArgs,
});

/** Stand-in for a real weather lookup. */
function lookupWeather(city: string): { city: string; temp_c: number } {
  return { city, temp_c: city.length * 3 };
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const model = process.argv[2] ?? "openai/gpt-4o-mini";
  const responder = Responder.fromEnv();

  const history: InputItem[] = [createUserMessage("What's the weather in Lisbon right now?")];

  // 1. Stream the first turn, printing text as it arrives.
  const stream = await responder.respond({
    model,
    input: history,
    tools: [weatherTool],
    stream: true,
  });

  for await (const event of stream) {
    if (event.type === EventType.TEXT_DELTA) {
      process.stdout.write(event.delta);
    }
  }
  const first = await stream.finalResponse();

  // 2. Answer each function call and send the results back.
  const calls = responder.getFunctionCalls(first);
  if (calls.length === 0) {
    console.log("\n(no tool call requested)");
    return;
  }

  history.push(...toInputItems(first));
  for (const call of calls) {
    const args = WeatherArgs.safeParse(JSON.parse(call.arguments));
    const result = args.success ? lookupWeather(args.data.city) : { error: "invalid arguments" };
    console.log(`[tool] ${call.name}(${call.arguments}) -> ${JSON.stringify(result)}`);
    history.push(createFunctionCallOutput(call.call_id, result));
  }

  // 3. Final answer, without streaming.
  const second = await responder.respond({ model, input: history, tools: [weatherTool] });
  console.log(responder.getOutputText(second));
  if (second.usage) {
    console.log(`\n[usage] ${second.usage.total_tokens ?? "?"} tokens`);
  }
}

main().catch((err: unknown) => {
  console.error("Example failed:", err);
  process.exit(1);
});
