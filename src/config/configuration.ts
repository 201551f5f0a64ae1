import * as Joi from "joi"

export const TTS_VOICES = ["alloy", "echo", "fable", "onyx", "nova", "shimmer"] as const
export type TtsVoice = (typeof TTS_VOICES)[number]

export const TTS_MODELS = ["tts-1", "tts-1-hd"] as const
export type TtsModel = (typeof TTS_MODELS)[number]

/**
 * Settings the worker-side activities need. Read straight from the environment
 * because activities run outside the Nest container.
 */
export interface PipelineSettings {
  TEMP_DIR: string
  UPLOAD_DIR: string
  OUTPUT_DIR: string
  OPENAI_API_KEY: string
  OPENAI_MODEL: string
  OPENAI_TRANSCRIPTION_MODEL: string
  OPENAI_TTS_MODEL: TtsModel
  OPENAI_TTS_VOICE: TtsVoice
  CONFIDENCE_THRESHOLD: number
  MAX_TEMPO: number
  PRESERVE_TERMS: string[]
}

export interface AppConfig extends PipelineSettings {
  SERVICE_NAME: string
  PORT: number
  NODE_ENV: "development" | "production" | "test"
  TEMPORAL_SERVER_ADDRESS: string
  TEMPORAL_NAMESPACE: string
  TEMPORAL_TASK_QUEUE: string
}

const pipelineKeys = {
  // File paths
  TEMP_DIR: Joi.string().default("/tmp/video-dubber"),
  UPLOAD_DIR: Joi.string().default("/tmp/video-dubber/uploads"),
  OUTPUT_DIR: Joi.string().default("/output/video-dubber"),

  // OpenAI
  OPENAI_API_KEY: Joi.string().allow("").default(""),
  OPENAI_MODEL: Joi.string().default("gpt-4o"),
  OPENAI_TRANSCRIPTION_MODEL: Joi.string().default("whisper-1"),
  OPENAI_TTS_MODEL: Joi.string()
    .valid(...TTS_MODELS)
    .default("tts-1"),
  OPENAI_TTS_VOICE: Joi.string()
    .valid(...TTS_VOICES)
    .default("alloy"),

  // Dubbing
  CONFIDENCE_THRESHOLD: Joi.number().min(0).max(1).default(0.25),
  MAX_TEMPO: Joi.number().min(1).max(2).default(1.5),
  PRESERVE_TERMS: Joi.array().items(Joi.string()).default([]),
}

const pipelineSchema = Joi.object<PipelineSettings>(pipelineKeys)

const appSchema = Joi.object<AppConfig>({
  // Service
  SERVICE_NAME: Joi.string().required(),
  PORT: Joi.number().port().default(3001),
  NODE_ENV: Joi.string().valid("development", "production", "test").default("development"),

  // Temporal
  TEMPORAL_SERVER_ADDRESS: Joi.string().required(),
  TEMPORAL_NAMESPACE: Joi.string().default("default"),
  TEMPORAL_TASK_QUEUE: Joi.string().default("dubbing-queue"),

  ...pipelineKeys,
})

/**
 * Split a comma separated list, dropping blanks
 */
export function parseList(raw: string | undefined): string[] {
  if (!raw) {
    return []
  }
  return raw
    .split(",")
    .map((term) => term.trim())
    .filter((term) => term.length > 0)
}

function pipelineInput(env: NodeJS.ProcessEnv) {
  return {
    TEMP_DIR: env.TEMP_DIR || undefined,
    UPLOAD_DIR: env.UPLOAD_DIR || undefined,
    OUTPUT_DIR: env.OUTPUT_DIR || undefined,
    OPENAI_API_KEY: env.OPENAI_API_KEY || "",
    OPENAI_MODEL: env.OPENAI_MODEL || undefined,
    OPENAI_TRANSCRIPTION_MODEL: env.OPENAI_TRANSCRIPTION_MODEL || undefined,
    OPENAI_TTS_MODEL: env.OPENAI_TTS_MODEL || undefined,
    OPENAI_TTS_VOICE: env.OPENAI_TTS_VOICE || undefined,
    CONFIDENCE_THRESHOLD: env.CONFIDENCE_THRESHOLD || undefined,
    MAX_TEMPO: env.MAX_TEMPO || undefined,
    PRESERVE_TERMS: parseList(env.PRESERVE_TERMS),
  }
}

/**
 * Build and validate the service configuration from environment variables
 */
export function loadConfiguration(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const config = {
    SERVICE_NAME: env.SERVICE_NAME || "video-dubber",
    PORT: env.PORT || undefined,
    NODE_ENV: env.NODE_ENV || undefined,
    TEMPORAL_SERVER_ADDRESS: env.TEMPORAL_SERVER_ADDRESS || "temporal:7233",
    TEMPORAL_NAMESPACE: env.TEMPORAL_NAMESPACE || undefined,
    TEMPORAL_TASK_QUEUE: env.TEMPORAL_TASK_QUEUE || undefined,
    ...pipelineInput(env),
  }

  const { value, error } = appSchema.validate(config, { allowUnknown: true })

  if (error) {
    throw new Error(`Config validation error: ${error.message}`)
  }

  return value
}

/**
 * Activity-side settings, validated with the same rules as the service config
 */
export function getPipelineSettings(env: NodeJS.ProcessEnv = process.env): PipelineSettings {
  const { value, error } = pipelineSchema.validate(pipelineInput(env), { allowUnknown: true })

  if (error) {
    throw new Error(`Pipeline settings validation error: ${error.message}`)
  }

  return value
}
