import { IsString, IsOptional, IsNotEmpty, MinLength, IsBoolean, ValidateNested, IsIn, IsNumber, Min, Max, IsArray, ArrayMaxSize } from "class-validator"
import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger"
import { Transform, Type } from "class-transformer"
import { SUPPORTED_LANGUAGES } from "../config/languages"
import { TTS_VOICES } from "../config/configuration"

export const SUBTITLE_MODES = ["none", "soft", "burn"] as const

/**
 * Form fields arrive as strings; implicit conversion would turn "false" into true
 */
export function parseFormBoolean(value: unknown): unknown {
  if (value === "true") {
    return true
  }
  if (value === "false") {
    return false
  }
  return value
}

/**
 * Options that shape a single dubbing run
 */
export class DubOptionsDto {
  @ApiPropertyOptional({
    description: "How translated subtitles end up in the video: not at all, as a selectable track, or burned into the picture",
    enum: SUBTITLE_MODES,
    default: "none",
  })
  @IsIn(SUBTITLE_MODES)
  @IsOptional()
  subtitleMode?: (typeof SUBTITLE_MODES)[number]

  @ApiPropertyOptional({
    description: "Whether to compose the dubbed video; otherwise only the dub track and subtitles are produced",
    default: true,
  })
  @IsBoolean()
  @IsOptional()
  generateVideo?: boolean

  @ApiPropertyOptional({ description: "Text-to-speech voice", enum: TTS_VOICES, example: "nova" })
  @IsIn(TTS_VOICES)
  @IsOptional()
  voice?: string

  @ApiPropertyOptional({
    description: "Characters the narrator reads per second; bounds each translated line (defaults depend on the target language)",
    example: 5.68,
  })
  @IsNumber()
  @Min(1)
  @Max(40)
  @IsOptional()
  charsPerSecond?: number

  @ApiPropertyOptional({ description: "Words transcribed with lower confidence are dropped", example: 0.25 })
  @IsNumber()
  @Min(0)
  @Max(1)
  @IsOptional()
  confidenceThreshold?: number

  @ApiPropertyOptional({ description: "Terms kept verbatim in the translation (names, brands)", example: ["Acme"], type: [String] })
  @IsArray()
  @IsString({ each: true })
  @ArrayMaxSize(50)
  @IsOptional()
  preserveTerms?: string[]

  @ApiPropertyOptional({ description: "Largest speed-up applied to a clip that overruns its slot", example: 1.5 })
  @IsNumber()
  @Min(1)
  @Max(2)
  @IsOptional()
  maxTempo?: number
}

/**
 * DTO for starting a dubbing workflow
 */
export class DubVideoDto {
  @ApiProperty({
    description: "URL or local path to the video file",
    example: "https://example.com/video.mp4",
  })
  @IsString()
  @IsNotEmpty({ message: "videoUrl is required" })
  @MinLength(1, { message: "videoUrl cannot be empty" })
  videoUrl!: string

  @ApiProperty({
    description: "Language to dub into",
    example: "Japanese",
    enum: SUPPORTED_LANGUAGES,
  })
  @IsString()
  @IsNotEmpty({ message: "targetLanguage is required" })
  @IsIn(SUPPORTED_LANGUAGES, { message: "targetLanguage must be one of the supported languages" })
  targetLanguage!: string

  @ApiPropertyOptional({
    description: "Spoken language of the video (auto-detected if not provided)",
    example: "English",
  })
  @IsString()
  @IsOptional()
  sourceLanguage?: string

  @ApiPropertyOptional({
    description: "Original filename (used for workflow ID and output name, extracted from the URL if not provided)",
    example: "product-demo.mp4",
  })
  @IsString()
  @IsOptional()
  fileName?: string

  @ApiPropertyOptional({ description: "Dubbing options", type: DubOptionsDto })
  @ValidateNested()
  @Type(() => DubOptionsDto)
  @IsOptional()
  options?: DubOptionsDto
}

/**
 * DTO for file upload dubbing (multipart form, every field arrives as a string)
 */
export class DubFileDto {
  @ApiProperty({ description: "Language to dub into", example: "Japanese", enum: SUPPORTED_LANGUAGES })
  @IsString()
  @IsNotEmpty({ message: "targetLanguage is required" })
  @IsIn(SUPPORTED_LANGUAGES, { message: "targetLanguage must be one of the supported languages" })
  targetLanguage!: string

  @ApiPropertyOptional({ description: "Spoken language of the video (auto-detected if not provided)", example: "English" })
  @IsString()
  @IsOptional()
  sourceLanguage?: string

  @ApiPropertyOptional({ enum: SUBTITLE_MODES, default: "none" })
  @IsIn(SUBTITLE_MODES)
  @IsOptional()
  subtitleMode?: (typeof SUBTITLE_MODES)[number]

  @ApiPropertyOptional({ enum: TTS_VOICES })
  @IsIn(TTS_VOICES)
  @IsOptional()
  voice?: string

  @ApiPropertyOptional({ description: "Set to false to produce only the dub track and subtitles", default: true })
  @Transform(({ obj, key }) => parseFormBoolean(Reflect.get(obj, key)))
  @IsBoolean()
  @IsOptional()
  generateVideo?: boolean
}
