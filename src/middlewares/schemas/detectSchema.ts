/**
 * Detect Request Validation Schema
 * Zod schema for the body of a noise detection invocation.
 * Messages are returned to the caller verbatim as the response `error`.
 */

import { z } from "zod";

const identifier = (field: string) =>
  z
    .string({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a string`,
    })
    .min(1, `${field} must not be empty`);

const numeric = (field: string) =>
  z.number({
    required_error: `${field} is required`,
    invalid_type_error: `${field} must be a number`,
  });

export const detectRequestSchema = z.object(
  {
    bucket_name: identifier("bucket_name"),
    key_name: identifier("key_name"),
    noise_tolerance: numeric("noise_tolerance").finite("noise_tolerance must be a finite number"),
    noise_duration: numeric("noise_duration")
      .finite("noise_duration must be a finite number")
      .positive("noise_duration must be greater than 0"),
  },
  {
    required_error: "Request body is required",
    invalid_type_error: "Request body must be a JSON object",
  }
);

export type DetectRequest = z.infer<typeof detectRequestSchema>;
