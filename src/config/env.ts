import dotenv from "dotenv";

dotenv.config();

const minutes = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value || "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export const config = {
  port: parseInt(process.env.PORT || "3001", 10),
  isProduction: process.env.NODE_ENV === "production",
  redisUrl: process.env.REDIS_URL || "redis://localhost:6379",
  jwtSecret: process.env.JWT_SECRET || "dev_secret_change_me",
  accessTokenExpireMinutes: minutes(
    process.env.ACCESS_TOKEN_EXPIRE_MINUTES,
    30,
  ),
  // 7 days
  refreshTokenExpireMinutes: minutes(
    process.env.REFRESH_TOKEN_EXPIRE_MINUTES,
    10080,
  ),
};
