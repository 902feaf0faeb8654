import { z } from "zod";

export const loginSchema = z.object({
  username: z.string().min(1).max(255),
  password: z.string().min(1).max(1024)
});

export const createDirectorySchema = z.object({
  name: z.string().max(4096).default("")
});

export const unpackArchiveSchema = z.object({
  archiveName: z.string().min(1).max(4096)
});
