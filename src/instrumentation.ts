/**
 * Sentry Bootstrap
 *
 * Imported before any other application code so refresh spans and alerts
 * are captured. Initialises only when COOKIE_WARDEN_SENTRY_DSN is set.
 */

import * as Sentry from "@sentry/node";
import { SERVICE_NAME, SERVICE_VERSION } from "./shared/constants.js";

const SENTRY_DSN = process.env.COOKIE_WARDEN_SENTRY_DSN;
const NODE_ENV = process.env.NODE_ENV ?? "development";

if (SENTRY_DSN) {
  Sentry.init({
    dsn: SENTRY_DSN,

    // One refresh every few hours: sample every trace
    tracesSampleRate: 1.0,

    environment: NODE_ENV,
    release: `${SERVICE_NAME}@${SERVICE_VERSION}`,
    serverName: process.env.HOSTNAME ?? "local",
    attachStacktrace: true,

    // Cookie values are credentials; never ship them
    beforeSend(event) {
      if (event.request?.cookies) {
        event.request.cookies = {};
      }
      if (event.request?.headers) {
        delete event.request.headers.authorization;
        delete event.request.headers.cookie;
      }
      return event;
    },
  });

  Sentry.setTag("service", SERVICE_NAME);
}

export { Sentry };
