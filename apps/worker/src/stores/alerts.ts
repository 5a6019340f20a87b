import type { AlertRecord } from "@movewatch/shared";
import type { Db, Expirable } from "./types.js";

export interface AlertStore extends Expirable {
  record(alert: AlertRecord, expiresAt: Date): Promise<void>;
  /** Alerts sent at or after `since`, newest first. */
  since(since: Date): Promise<AlertRecord[]>;
}

type AlertRow = {
  market_id: string;
  signal_id: string;
  sent_at: Date;
  text: string;
};

export class PgAlertStore implements AlertStore {
  readonly collection = "alerts";

  constructor(private readonly db: Db) {}

  async record(alert: AlertRecord, expiresAt: Date): Promise<void> {
    await this.db.query(
      `
        INSERT INTO alerts (market_id, signal_id, sent_at, text, expires_at)
        VALUES ($1, $2, $3, $4, $5)
      `,
      [alert.marketId, alert.signalId, alert.sentAt, alert.text, expiresAt]
    );
  }

  async since(since: Date): Promise<AlertRecord[]> {
    const result = await this.db.query<AlertRow>(
      `
        SELECT market_id, signal_id, sent_at, text
        FROM alerts
        WHERE sent_at >= $1
        ORDER BY sent_at DESC
      `,
      [since]
    );
    return result.rows.map((row) => ({
      marketId: row.market_id,
      signalId: row.signal_id,
      sentAt: row.sent_at,
      text: row.text
    }));
  }

  async purgeExpired(now: Date): Promise<number> {
    const result = await this.db.query(`DELETE FROM alerts WHERE expires_at <= $1`, [now]);
    return result.rowCount ?? 0;
  }
}
