import type { RequestHandler } from "express";
import { HttpError } from "../utils/errors";

export const notFoundHandler: RequestHandler = (req, _res, next) => {
  next(new HttpError(404, `No route for ${req.method} ${req.originalUrl}`));
};

export default notFoundHandler;
