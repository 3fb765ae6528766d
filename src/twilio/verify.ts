import twilio from "twilio";
import type { Request, Response, NextFunction } from "express";

/**
 * Rejects Twilio status callbacks whose X-Twilio-Signature does not match. When no public
 * base URL is configured the URL Twilio signed is rebuilt from the request's own host.
 */
export function twilioValidateMiddleware(opts: {
  authToken: string | undefined;
  enabled: boolean;
  publicBaseUrl: string | undefined;
}) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!opts.enabled) return next();
    if (!opts.authToken) return res.status(500).send("Twilio signature validation enabled without TWILIO_AUTH_TOKEN");

    const signature = req.header("X-Twilio-Signature");
    if (!signature) return res.status(401).send("Missing Twilio signature");

    const base = opts.publicBaseUrl ?? `${req.protocol}://${req.get("host") ?? "localhost"}`;
    const url = new URL(req.originalUrl, base).toString();
    // Status callbacks are form-encoded, so the sorted-params variant applies.
    const params: Record<string, string> = {};
    for (const [k, v] of Object.entries(req.body ?? {})) {
      if (typeof v === "string") params[k] = v;
    }
    const ok = twilio.validateRequest(opts.authToken, signature, url, params);

    if (!ok) return res.status(403).send("Invalid Twilio signature");
    return next();
  };
}
