import pino from "pino";
import { loadEnvSettings } from "./config/loader.js";

// stdout belongs to the native binary. Writes are synchronous so nothing is
// still buffered when execve replaces the process image.
export const logger = pino(
  {
    name: "upd-launcher",
    level: loadEnvSettings(process.env).logLevel,
  },
  pino.destination({ dest: 2, sync: true }),
);
