import { config } from "../config.js";
import { TelegramAlertSink } from "../integrations/telegram.js";

async function main(): Promise<void> {
  const sink = new TelegramAlertSink({
    enabled: true,
    mode: config.TELEGRAM_MODE,
    botToken: config.TELEGRAM_BOT_TOKEN,
    chatId: config.TELEGRAM_CHAT_ID,
    apiId: config.TELEGRAM_API_ID,
    apiHash: config.TELEGRAM_API_HASH,
    session: config.TELEGRAM_SESSION,
    target: config.TELEGRAM_TARGET
  });

  try {
    await sink.send(`Movewatch test message (${new Date().toISOString()})`);
    console.log("telegram:test complete");
  } finally {
    await sink.close();
  }
}

main().catch((error) => {
  console.error("[telegram:test] failed", error);
  process.exitCode = 1;
});
