import { spawn } from "child_process";
import { promises as fs } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { parsePlanText, renderPlanText } from "./plan.js";
import type { Plan } from "./types.js";

export interface EditorOptions {
  editor?: string;
  tempDir?: string;
}

export function defaultEditor(): string {
  return process.env.EDITOR || (process.platform === "win32" ? "notepad" : "nano");
}

function openInEditor(editor: string, filePath: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const editorProcess = spawn(editor, [filePath], {
      stdio: "inherit",
      shell: true,
    });
    editorProcess.on("error", (err) => reject(err));
    editorProcess.on("close", (code) => {
      if (code === 0) resolve();
      else reject(new Error(`Editor exited with code ${code}`));
    });
  });
}

/**
 * Let the user rewrite the plan in their editor, one command per line.
 * Falls back to the original plan when the editor fails or the edited text
 * does not tokenize.
 */
export async function editPlanInEditor(
  plan: Plan,
  options: EditorOptions = {}
): Promise<Plan> {
  const editor = options.editor ?? defaultEditor();
  const tempFilePath = join(
    options.tempDir ?? tmpdir(),
    `docsift-plan-${process.pid}.txt`
  );

  console.log(`📝 Opening plan in editor: ${editor}`);
  console.log(`(Temp file: ${tempFilePath})`);

  try {
    await fs.writeFile(tempFilePath, renderPlanText(plan));
    await openInEditor(editor, tempFilePath);
    return parsePlanText(await fs.readFile(tempFilePath, "utf-8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`❌ Failed to edit the plan (${message}); keeping the original.`);
    return plan;
  } finally {
    await fs.rm(tempFilePath, { force: true });
  }
}
