import type { UserRecord } from "../db/schema.js";

declare global {
  namespace Express {
    interface User extends UserRecord {}
  }
}

export {};
