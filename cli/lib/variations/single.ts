/**
 * `single`: one record with no parameters, for targets whose input has
 * no shape to sweep.
 *
 * @module
 */

import { z } from "zod";
import type { VariationStrategy } from "./types.ts";

const SingleSchema = z.object({}).strict();

export const single: VariationStrategy<z.infer<typeof SingleSchema>> = {
  name: "single",
  schema: SingleSchema,
  generate() {
    return [{ strategy: "single", parameters: {} }];
  },
};
