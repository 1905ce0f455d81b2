import Ajv from "ajv";
import type { ErrorObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import kidSchema from "../schemas/kid.schema.json";
import momentSchema from "../schemas/moment.schema.json";
import type { KidRecord, MomentRecord } from "./records";

const ajv = new Ajv({ allErrors: true, strict: false, useDefaults: true });
addFormats(ajv);

export const validateKid: ValidateFunction<KidRecord> = ajv.compile<KidRecord>(kidSchema);
export const validateMoment: ValidateFunction<MomentRecord> = ajv.compile<MomentRecord>(momentSchema);

export function describeErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) {
    return "unknown validation error";
  }
  return errors
    .map((e) => {
      const missing = e.keyword === "required" ? `/${String(e.params.missingProperty)}` : "";
      const path = `${e.instancePath}${missing}` || "/";
      return `${path} ${e.message ?? "is invalid"}`;
    })
    .join("; ");
}
