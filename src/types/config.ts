// src/types/config.ts
import { z } from "zod";
import { RunConfigSchema, RetryPolicySchema } from "../models/config.js";

export type RunConfig = z.infer<typeof RunConfigSchema>;
export type RunConfigInput = z.input<typeof RunConfigSchema>;
export type RetryPolicy = z.infer<typeof RetryPolicySchema>;
