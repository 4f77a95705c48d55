import Ajv, { ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import sessionManifestSchema from "../../schemas/session-manifest.schema.json";
import { SessionManifest } from "../types/sessionManifest";
import { InvalidInputError } from "../errors";

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

let sessionManifestValidator: ValidateFunction<SessionManifest> | null = null;

export function getSessionManifestValidator(): ValidateFunction<SessionManifest> {
  if (!sessionManifestValidator) {
    sessionManifestValidator = ajv.compile<SessionManifest>(sessionManifestSchema);
  }
  return sessionManifestValidator;
}

export function schemaErrors(validator: ValidateFunction): string {
  return (validator.errors ?? [])
    .map((error) => `${error.instancePath || "<root>"} ${error.message}`)
    .join("; ");
}

export function assertValidSessionManifest(data: unknown, label: string): SessionManifest {
  const validator = getSessionManifestValidator();
  if (validator(data)) return data;
  throw new InvalidInputError(`${label} failed schema validation: ${schemaErrors(validator)}`);
}
