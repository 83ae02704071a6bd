import { err, ok, type Result } from "neverthrow";
import { boundaryError, type AppBoundaryError } from "../entities/appError";
import type { FetchRequest } from "../ports/inboundPorts";

export const validateFetchRequest = (
  request: FetchRequest,
  provider: string,
  now: Date,
): Result<FetchRequest, AppBoundaryError> => {
  if (!request.target.name.trim()) {
    return err(
      boundaryError("plugin", "invalid_input", provider, "Company name must not be empty."),
    );
  }

  if (request.since && request.since.getTime() > now.getTime()) {
    return err(
      boundaryError(
        "plugin",
        "invalid_input",
        provider,
        `'since' (${request.since.toISOString()}) is in the future.`,
      ),
    );
  }

  return ok(request);
};
