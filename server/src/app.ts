import path from "node:path";
import cors from "cors";
import express from "express";
import helmet from "helmet";
import morgan from "morgan";
import session from "express-session";
import { env, isProduction, isTest } from "./config/env.js";
import { passport } from "./config/passport.js";
import { SESSION_COOKIE } from "./constants.js";
import { authRouter } from "./routes/auth.js";
import { ingredientRouter, tagRouter } from "./routes/catalog.js";
import { recipeRouter } from "./routes/recipes.js";
import { shortLinkRouter } from "./routes/short-links.js";
import { userRouter } from "./routes/users.js";
import { errorHandler, notFound } from "./middleware/error.js";

export const app = express();

app.set("trust proxy", 1);
app.use(helmet({ crossOriginResourcePolicy: { policy: "cross-origin" } }));
app.use(
  cors({
    origin: env.CLIENT_URL,
    credentials: true,
  }),
);
if (!isTest) {
  app.use(morgan("dev"));
}
app.use(express.json({ limit: "10mb" }));
app.use(
  session({
    name: SESSION_COOKIE,
    secret: env.SESSION_SECRET,
    resave: false,
    saveUninitialized: false,
    cookie: {
      httpOnly: true,
      sameSite: "lax",
      secure: isProduction,
      maxAge: 1000 * 60 * 60 * 24 * 7,
    },
  }),
);
app.use(passport.initialize());
app.use(passport.session());

app.get("/api/health", (_req, res) => {
  res.json({ status: "ok" });
});

app.use("/media", express.static(path.resolve(env.MEDIA_ROOT)));

app.use("/api/auth", authRouter);
app.use("/api/users", userRouter);
app.use("/api/tags", tagRouter);
app.use("/api/ingredients", ingredientRouter);
app.use("/api/recipes", recipeRouter);
app.use("/s", shortLinkRouter);

app.use(notFound);
app.use(errorHandler);
