import type { Admitted } from "./types.js";

declare global {
  namespace Express {
    interface Locals {
      /** Admissions recorded by the admission gate: one per priced call, keyed by tool id. */
      admissions?: Map<string, Admitted[]>;
    }
  }
}

export {};
