import * as readline from "readline";
import type { AskFn, Plan, ReviewState } from "./types.js";

export const CONFIRMATION_WORD = "yes";

/**
 * Only `awaiting_confirmation` accepts input: "yes" approves, anything else
 * rejects. `approved` and `rejected` are final.
 */
export function nextReviewState(state: ReviewState, input: string): ReviewState {
  if (state !== "awaiting_confirmation") return state;
  return input.trim().toLowerCase() === CONFIRMATION_WORD
    ? "approved"
    : "rejected";
}

// readline question that also settles when stdin is closed (piped input, ctrl-d).
export const askQuestion: AskFn = (question) => {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    let answered = false;
    rl.on("close", () => {
      if (!answered) resolve("");
    });
    rl.question(question, (answer) => {
      answered = true;
      rl.close();
      resolve(answer);
    });
  });
};

export function printPlan(plan: Plan): void {
  console.log("------------------------------------------");
  console.log(`✅ Proposed plan (${plan.length} command(s)):\n`);
  plan.forEach((command, index) => {
    console.log(`   ${index + 1}. $ ${command.text}`);
  });
  console.log("\n------------------------------------------");
}

export async function reviewPlan(plan: Plan, ask: AskFn): Promise<ReviewState> {
  printPlan(plan);
  const answer = await ask(
    `Execute these commands? Type '${CONFIRMATION_WORD}' to confirm: `
  );
  const state = nextReviewState("awaiting_confirmation", answer);

  if (state === "rejected") {
    console.log("\n🛑 Plan rejected. Nothing was changed.");
  }
  return state;
}
