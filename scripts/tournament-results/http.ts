import { z } from "zod";

import { ApiError } from "./errors";
import { appendRunLog } from "./log";
import type { RunContext } from "./types";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface GraphqlRequest {
  operationName: string;
  query: string;
  variables: Record<string, unknown>;
}

export interface GraphqlOptions {
  endpoint: string;
  token: string;
  fetchImpl: FetchLike;
  ctx: RunContext;
}

const envelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(z.object({ message: z.string() })).optional(),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

export async function postGraphql<S extends z.ZodTypeAny>(
  request: GraphqlRequest,
  schema: S,
  { endpoint, token, fetchImpl, ctx }: GraphqlOptions
): Promise<z.infer<S>> {
  const variables = JSON.stringify(request.variables);
  appendRunLog(ctx, `POST ${endpoint} ${request.operationName} ${variables}`);

  let response: Response;
  try {
    response = await fetchImpl(endpoint, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
        Authorization: `Bearer ${token}`,
      },
      body: JSON.stringify(request),
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ApiError(`Request to start.gg failed: ${reason}`, {
      cause: error,
    });
  }

  if (!response.ok) {
    const text = await response.text().catch(() => "");
    appendRunLog(
      ctx,
      `${request.operationName} failed with HTTP ${response.status}: ${text.slice(0, 200)}`
    );
    throw new ApiError(
      `start.gg API responded with HTTP ${response.status} ${response.statusText}`.trim(),
      { status: response.status }
    );
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new ApiError("start.gg API returned a body that is not JSON", {
      cause: error,
    });
  }

  const envelope = envelopeSchema.safeParse(body);
  if (!envelope.success) {
    throw new ApiError(
      `Malformed start.gg response: ${describeIssues(envelope.error)}`
    );
  }
  if (envelope.data.errors?.length) {
    const messages = envelope.data.errors.map((err) => err.message);
    throw new ApiError(`start.gg API error: ${messages.join("; ")}`);
  }

  const parsed = schema.safeParse(envelope.data.data);
  if (!parsed.success) {
    throw new ApiError(
      `Unexpected ${request.operationName} response from start.gg: ${describeIssues(parsed.error)}`
    );
  }
  return parsed.data;
}
