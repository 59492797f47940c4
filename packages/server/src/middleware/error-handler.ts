import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { UnknownWaypointError } from "@waymark/navigation";

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (err instanceof ZodError) {
    console.warn(`[validation] ${JSON.stringify(err.issues)}`);
    res.status(422).json({
      message: "Validation failed",
      details: err.issues,
    });
    return;
  }

  if (err instanceof UnknownWaypointError) {
    console.warn(`[error] ${err.message}`);
    res.status(404).json({ message: err.message });
    return;
  }

  if (err instanceof Error) {
    console.error(`[error] ${err.message}`);
    const status = "status" in err && typeof err.status === "number" ? err.status : 500;
    res.status(status).json({ message: err.message });
    return;
  }

  next();
}
