import { z } from "zod";

import {
  JUSTIFY_STRATEGIES,
  type JustifyStrategy,
  LINE_ALIGNMENTS,
  type LineAlignment,
} from "../../justify/types.js";

export interface JustifySettings {
  width?: number;
  strategy: JustifyStrategy;
  align: LineAlignment;
}

export const justifySettingsSchema = z
  .object({
    width: z
      .number({ invalid_type_error: "width must be a number" })
      .int("width must be an integer")
      .positive("width must be greater than 0")
      .optional(),
    strategy: z.enum(JUSTIFY_STRATEGIES).optional(),
    align: z.enum(LINE_ALIGNMENTS).optional(),
  })
  .passthrough();
