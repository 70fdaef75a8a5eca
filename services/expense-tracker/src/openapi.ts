export function buildOpenApiSpec(serviceBaseUrl: string) {
  return {
    openapi: "3.0.3",
    info: {
      title: "Confidential Expense Tracker API",
      version: "0.1.0",
      description:
        "Encrypted per-identity running totals with per-handle decrypt capabilities. " +
        "Callers identify themselves with the x-caller-identity header.",
    },
    servers: [{ url: serviceBaseUrl }],
    paths: {
      "/health": {
        get: {
          summary: "Health check",
          responses: {
            "200": { description: "Service healthy" },
          },
        },
      },
      "/tracker/info": {
        get: {
          summary: "Processing identity and null handle",
          responses: {
            "200": { description: "Tracker info" },
          },
        },
      },
      "/contributions": {
        post: {
          summary: "Fold an encrypted contribution into the caller's total",
          responses: {
            "201": { description: "Contribution accepted, new total handle returned" },
            "400": { description: "Invalid request or integrity proof" },
            "401": { description: "Missing caller or service token" },
            "502": { description: "Encryption engine unavailable" },
          },
        },
      },
      "/totals/me": {
        get: {
          summary: "Caller's current total handle (null handle before any contribution)",
          responses: {
            "200": { description: "Total handle" },
            "401": { description: "Missing caller" },
          },
        },
      },
      "/totals/{identity}": {
        get: {
          summary: "Another identity's current total handle",
          responses: {
            "200": { description: "Total handle" },
            "400": { description: "Invalid identity" },
          },
        },
      },
      "/totals/me/public": {
        post: {
          summary: "Make the caller's current total handle publicly decryptable (irreversible)",
          responses: {
            "200": { description: "Handle published" },
            "401": { description: "Missing caller or service token" },
            "409": { description: "No total yet" },
          },
        },
      },
      "/totals/me/share": {
        post: {
          summary: "Grant a viewer decrypt-rights on the caller's current total handle",
          responses: {
            "200": { description: "Handle shared" },
            "400": { description: "Invalid viewer" },
            "401": { description: "Missing caller or service token" },
            "409": { description: "No total yet" },
          },
        },
      },
      "/events": {
        get: {
          summary: "Audit log, optionally filtered by identity",
          responses: {
            "200": { description: "Audit events in sequence order" },
            "400": { description: "Invalid filter" },
          },
        },
      },
      "/capabilities/{handle}": {
        get: {
          summary: "Capability grants recorded for a handle",
          responses: {
            "200": { description: "Grant relation for the handle" },
            "400": { description: "Invalid handle" },
          },
        },
      },
    },
  };
}
