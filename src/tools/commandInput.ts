import { z } from "zod";
import { commandKinds } from "../utils/commandUtil";

export const commandInputSchema = {
  name: z.string().trim().min(1, "Command name is required."),
  commandType: z.enum(commandKinds),
  content: z.string().refine((s) => s.trim().length > 0, "Command content is required."),
  description: z.string().optional(),
};
