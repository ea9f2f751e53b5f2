import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  MONGODB_URI: z.string().min(1).optional(),
  JWT_SECRET: z.string().min(1).default("dev_secret"),
  JWT_EXPIRES_IN_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),
  SHORT_LINK_BASE_URL: z.string().url().default("http://localhost:4000/s/"),
  PAGE_SIZE: z.coerce.number().int().positive().default(6),
  MAX_PAGE_SIZE: z.coerce.number().int().positive().default(100),
  MEDIA_ROOT: z.string().min(1).default("media"),
  MEDIA_URL: z
    .string()
    .regex(/^\/(.*\/)?$/, "must start and end with /")
    .default("/media/"),
  JSON_LIMIT: z.string().min(1).default("10mb"),
  PDF_FONT_PATH: z.string().min(1).optional(),
});

export interface AppConfig {
  port: number;
  mongoUri?: string;
  jwtSecret: string;
  jwtExpiresInSeconds: number;
  shortLinkBaseUrl: string;
  pageSize: number;
  maxPageSize: number;
  mediaRoot: string;
  mediaUrl: string;
  jsonLimit: string;
  /** TrueType font embedded in shopping-list PDFs. */
  pdfFontPath?: string;
}

/** Reads the environment once; the result is passed to whoever needs it. */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment: ${details}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    mongoUri: e.MONGODB_URI,
    jwtSecret: e.JWT_SECRET,
    jwtExpiresInSeconds: e.JWT_EXPIRES_IN_SECONDS,
    shortLinkBaseUrl: e.SHORT_LINK_BASE_URL,
    pageSize: e.PAGE_SIZE,
    maxPageSize: Math.max(e.MAX_PAGE_SIZE, e.PAGE_SIZE),
    mediaRoot: e.MEDIA_ROOT,
    mediaUrl: e.MEDIA_URL,
    jsonLimit: e.JSON_LIMIT,
    pdfFontPath: e.PDF_FONT_PATH,
  };
};
