import type { Query } from "./client";
import type { TokenRegistry } from "../store";
import type { DeviceToken } from "../types";

type TokenRow = {
  user_id: string;
  token: string;
  platform: string | null;
  created_at: Date;
};

function rowToToken(row: TokenRow): DeviceToken {
  return { userId: row.user_id, token: row.token, platform: row.platform, createdAt: row.created_at };
}

export function createTokenRegistry(query: Query): TokenRegistry {
  return {
    async findByUserId(userId: string): Promise<DeviceToken[]> {
      const result = await query<TokenRow>(
        "SELECT user_id, token, platform, created_at FROM fcm_tokens WHERE user_id = $1 ORDER BY created_at",
        [userId]
      );
      return result.rows.map(rowToToken);
    },

    async register(userId: string, token: string, platform?: string | null): Promise<DeviceToken> {
      // A token moves to whichever user registered it last.
      const result = await query<TokenRow>(
        `INSERT INTO fcm_tokens (user_id, token, platform, created_at)
         VALUES ($1, $2, $3, NOW())
         ON CONFLICT (token) DO UPDATE SET user_id = EXCLUDED.user_id, platform = EXCLUDED.platform
         RETURNING user_id, token, platform, created_at`,
        [userId, token, platform ?? null]
      );
      return rowToToken(result.rows[0]);
    },

    async deleteByToken(token: string): Promise<number> {
      const result = await query("DELETE FROM fcm_tokens WHERE token = $1", [token]);
      return result.rowCount ?? 0;
    },
  };
}
