import { z } from "zod";

export const scanRequestSchema = z.object(
  {
    image: z.string({
      required_error: "No image data provided",
      invalid_type_error: "Image must be a base64 string",
    }),
  },
  { required_error: "No image data provided", invalid_type_error: "No image data provided" },
);

export type ScanRequest = z.infer<typeof scanRequestSchema>;
