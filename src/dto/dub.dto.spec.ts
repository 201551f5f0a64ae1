import { plainToInstance } from "class-transformer"
import { validate } from "class-validator"
import { DubFileDto, DubVideoDto, parseFormBoolean } from "./dub.dto"

async function failedProperties(body: object): Promise<string[]> {
  const dto = plainToInstance(DubVideoDto, body, { enableImplicitConversion: true })
  const errors = await validate(dto, { whitelist: true, forbidNonWhitelisted: true })
  return errors.flatMap((error) => (error.children?.length ? error.children.map((child) => `${error.property}.${child.property}`) : [error.property]))
}

describe("dubbing DTOs", () => {
  const base = { videoUrl: "https://example.com/demo.mp4", targetLanguage: "Japanese" }

  it("should accept options at the edges of their ranges", async () => {
    await expect(failedProperties({ ...base, options: { charsPerSecond: 1, maxTempo: 2, confidenceThreshold: 0 } })).resolves.toEqual([])
    await expect(failedProperties({ ...base, options: { charsPerSecond: 40, maxTempo: 1, confidenceThreshold: 1 } })).resolves.toEqual([])
  })

  it.each([
    ["charsPerSecond", 0.5],
    ["charsPerSecond", 41],
    ["maxTempo", 0.9],
    ["maxTempo", 2.5],
    ["confidenceThreshold", -0.1],
    ["confidenceThreshold", 1.2],
  ])("should reject %s of %d", async (option, value) => {
    await expect(failedProperties({ ...base, options: { [option]: value } })).resolves.toEqual([`options.${option}`])
  })

  it("should reject an unsupported language and subtitle mode", async () => {
    await expect(failedProperties({ ...base, targetLanguage: "Klingon", options: { subtitleMode: "hard" } })).resolves.toEqual(["targetLanguage", "options.subtitleMode"])
  })

  describe("DubFileDto", () => {
    it("should read generateVideo from its form value", async () => {
      const dto = plainToInstance(DubFileDto, { targetLanguage: "Spanish", generateVideo: "false" }, { enableImplicitConversion: true })

      expect(dto.generateVideo).toBe(false)
      await expect(validate(dto)).resolves.toEqual([])
    })

    it("should reject a generateVideo that is not a boolean", async () => {
      const dto = plainToInstance(DubFileDto, { targetLanguage: "Spanish", generateVideo: "maybe" })
      const errors = await validate(dto)

      expect(errors.map((error) => error.property)).toEqual(["generateVideo"])
    })
  })

  it("should only convert the literal form booleans", () => {
    expect(parseFormBoolean("true")).toBe(true)
    expect(parseFormBoolean("false")).toBe(false)
    expect(parseFormBoolean("yes")).toBe("yes")
  })
})
