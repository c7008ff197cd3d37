import { Router } from "express";
import { resolveShortLink } from "../services/short-link.js";
import { asyncHandler } from "../utils/async-handler.js";
import { readParam } from "../utils/params.js";

export const shortLinkRouter = Router();

shortLinkRouter.get(
  "/:code",
  asyncHandler(async (req, res) => {
    const { location } = await resolveShortLink(readParam(req.params.code) ?? "");
    res.redirect(302, location);
  }),
);
