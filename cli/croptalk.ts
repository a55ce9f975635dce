import { config } from "dotenv";
import { stdin as input, stdout as output } from "node:process";
import { createInterface } from "node:readline/promises";
import { loadConfig } from "@/lib/config";
import { runConsole, type ConsoleIO } from "@/lib/console";

config();

async function main(): Promise<void> {
  const rl = createInterface({ input, output });
  let closed = false;
  rl.on("close", () => {
    closed = true;
  });

  const io: ConsoleIO = {
    async ask(prompt) {
      if (closed) return null;
      try {
        return await rl.question(prompt);
      } catch (error) {
        // Ctrl-D / Ctrl-C close the interface and reject the pending question.
        if (closed) return null;
        throw error;
      }
    },
    print(text = "") {
      console.log(text);
    },
  };

  try {
    await runConsole({ io, config: loadConfig(), envFilePath: ".env" });
  } finally {
    rl.close();
  }
}

main().catch((error: unknown) => {
  console.error("CropTalk error:", error);
  process.exitCode = 1;
});
