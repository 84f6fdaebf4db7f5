import { env } from "./config";
import { sleep } from "./retry";

export async function actionDelay(): Promise<void> {
  const min = env.SCRAPER_ACTION_DELAY_MIN_MS;
  const max = Math.max(min, env.SCRAPER_ACTION_DELAY_MAX_MS);
  const delay = min + Math.random() * (max - min);

  await sleep(delay);
}
