import { eq } from "drizzle-orm";
import passport from "passport";
import { users } from "../db/schema.js";
import { db } from "./db.js";

passport.serializeUser((user, done) => {
  done(null, user.id);
});

passport.deserializeUser(async (id: number, done) => {
  try {
    const user = await db.query.users.findFirst({ where: eq(users.id, id) });

    if (!user) {
      return done(null, false);
    }

    done(null, user);
  } catch (error) {
    done(error);
  }
});

export { passport };
