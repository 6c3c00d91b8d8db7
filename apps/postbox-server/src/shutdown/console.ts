import readline from "node:readline";
import type { Readable } from "node:stream";

/**
 * Call `onQuit` once when the operator types "q" on its own line.
 * Returns a function that stops watching.
 */
export function watchConsoleForQuit(input: Readable, onQuit: () => void): () => void {
  const rl = readline.createInterface({ input, terminal: false });
  let fired = false;

  rl.on("line", (line) => {
    if (fired || line.trim().toLowerCase() !== "q") return;
    fired = true;
    console.log("[server] Quit requested from console");
    onQuit();
  });

  return () => rl.close();
}
