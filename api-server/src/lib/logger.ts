import winston from "winston";
import {
  generateSpanId,
  truncateText,
  pickHeaders,
  normalizeError,
} from "keyward-core";

const nodeEnv = process.env.NODE_ENV || "development";

// Dev formatting - pretty text, opt-in via LOG_PRETTY=true
const devFormat = winston.format.combine(
  winston.format.timestamp({ format: "HH:mm:ss" }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let output = `${timestamp} [${level.toUpperCase()}] ${message}`;

    if (Object.keys(meta).length > 0) {
      output += "\n" + JSON.stringify(meta, null, 2);
    }

    return output;
  }),
);

// Compact JSON format for production
const prodFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

const logFormat =
  (process.env.LOG_PRETTY || "").toLowerCase() === "true"
    ? devFormat
    : prodFormat;

const transports: winston.transport[] = [
  new winston.transports.Console({
    stderrLevels: ["error"],
    consoleWarnLevels: ["warn"],
  }),
];

if (nodeEnv !== "production" && nodeEnv !== "test") {
  transports.push(
    new winston.transports.File({
      filename: "logs/keyward-error.log",
      level: "error",
    }),
    new winston.transports.File({
      filename: "logs/keyward-combined.log",
    }),
  );
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: logFormat,
  defaultMeta: { service: "api" },
  transports,
  silent: nodeEnv === "test",
});

export { generateSpanId };

interface ApiRequestLog {
  url: string;
  method: string;
  headers: Record<string, string | string[] | undefined>;
  userAgent?: string;
  ip?: string;
  body?: unknown;
}

interface ApiResponseLog {
  status: number;
}

// Only headers useful for debugging are logged
const API_REQUEST_HEADER_ALLOWLIST = new Set([
  "content-type",
  "content-length",
  "accept",
  "origin",
  "referer",
  "host",
  "x-request-id",
  "x-correlation-id",
]);

// Presence is useful, value is a credential
const REDACTED_HEADERS = new Set(["authorization", "x-api-key", "cookie"]);

// Request bodies on this service carry passwords and tokens
const REDACTED_BODY_FIELDS = new Set(["password", "token"]);

function redactBody(body: unknown): unknown {
  if (body === null || typeof body !== "object" || Array.isArray(body)) {
    return body;
  }
  return Object.fromEntries(
    Object.entries(body).map(([key, value]) => [
      key,
      REDACTED_BODY_FIELDS.has(key) ? "[REDACTED]" : value,
    ]),
  );
}

function truncateBody(body: unknown): { bodyPreview?: string; bodyLength?: number } {
  if (body === null || body === undefined) return {};
  const redacted = redactBody(body);
  const text = typeof redacted === "string" ? redacted : JSON.stringify(redacted);
  const { preview, length } = truncateText(text);
  return { bodyPreview: preview, bodyLength: length };
}

export const logApiCallStart = (
  spanId: string,
  service: string,
  method: string,
  request: ApiRequestLog,
) => {
  const { body, headers, ...rest } = request;
  logger.info("API call started", {
    type: "api_call_start",
    span_id: spanId,
    service,
    method,
    request: {
      ...rest,
      headers: pickHeaders(headers, API_REQUEST_HEADER_ALLOWLIST, REDACTED_HEADERS),
      ...truncateBody(body),
    },
  });
};

export const logApiCallComplete = (
  spanId: string,
  service: string,
  method: string,
  response: ApiResponseLog,
  duration: number,
) => {
  logger.info("API call completed", {
    type: "api_call_complete",
    span_id: spanId,
    service,
    method,
    response,
    duration_ms: duration,
  });
};

export const logApiCallError = (
  spanId: string,
  service: string,
  method: string,
  error: unknown,
  duration: number,
) => {
  logger.error("API call failed", {
    type: "api_call_error",
    span_id: spanId,
    service,
    method,
    error: normalizeError(error),
    duration_ms: duration,
  });
};

export { logger, redactBody };
export default logger;
