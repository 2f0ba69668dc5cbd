import "dotenv/config";
import { z } from "zod";

export const env = z
  .object({
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),

    LIMIT_ORDERS_PROGRAM_ID: z.string().min(32).default("8iLgCVnHhEKyhm7qsnUkDPaE3MKFx6ce9a8JpB293RDW"),
    PERMISSION_ROUTER_PROGRAM_ID: z.string().min(32).default("GwpbwAaio1SFNxLuGkd3GwksW7q32k3LBUjHBiadWvr5"),

    // simulation script
    DEFAULT_CLOSE_DELAY_SEC: z.coerce.number().int().min(0).max(86_400).default(60),
  })
  .parse(process.env);

/**
 * Derived helpers
 */
export const isProduction = process.env.NODE_ENV === "production";
