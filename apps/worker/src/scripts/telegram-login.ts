import "dotenv/config";
import readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { z } from "zod";

// Only the user-mode credentials; the worker config would also demand DATABASE_URL.
const loginEnv = z.object({
  TELEGRAM_API_ID: z.coerce.number().int().positive({ message: "set TELEGRAM_API_ID in .env first" }),
  TELEGRAM_API_HASH: z.string().trim().min(10, { message: "set TELEGRAM_API_HASH in .env first" }),
  TELEGRAM_PHONE: z.string().trim().optional(),
  TELEGRAM_PASSWORD: z.string().trim().optional()
});

async function main(): Promise<void> {
  const env = loginEnv.parse(process.env);

  const { TelegramClient } = await import("telegram");
  const { StringSession } = await import("telegram/sessions/index.js");

  const rl = readline.createInterface({ input, output });
  const ask = async (prompt: string): Promise<string> => (await rl.question(prompt)).trim();

  const client = new TelegramClient(new StringSession(""), env.TELEGRAM_API_ID, env.TELEGRAM_API_HASH, {
    connectionRetries: 1
  });

  try {
    await client.start({
      phoneNumber: async () => env.TELEGRAM_PHONE || (await ask("Phone number (+1...): ")),
      password: async () => env.TELEGRAM_PASSWORD || (await ask("2FA password (if enabled): ")),
      phoneCode: async () => ask("Login code: "),
      onError: (error) => console.error("[telegram-login] error", error)
    });
  } finally {
    rl.close();
  }

  console.log("");
  console.log("Session ready. Add this to your .env and set TELEGRAM_MODE=user:");
  console.log(`TELEGRAM_SESSION=${client.session.save()}`);

  await client.disconnect();
}

main().catch((error) => {
  console.error("[telegram-login] failed", error);
  process.exitCode = 1;
});
