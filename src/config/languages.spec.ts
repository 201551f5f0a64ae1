import { SUPPORTED_LANGUAGES, languageCode, languageName } from "./languages"

describe("languages", () => {
  it("should list language names", () => {
    expect(SUPPORTED_LANGUAGES).toContain("Japanese")
    expect(SUPPORTED_LANGUAGES).toContain("Ukrainian")
    expect(SUPPORTED_LANGUAGES).not.toContain("ja")
  })

  it("should map names and codes to codes", () => {
    expect(languageCode("Japanese")).toBe("ja")
    expect(languageCode(" japanese ")).toBe("ja")
    expect(languageCode("PT")).toBe("pt")
    expect(languageCode("Klingon")).toBeUndefined()
  })

  it("should normalize to the display name", () => {
    expect(languageName("english")).toBe("English")
    expect(languageName("de")).toBe("German")
    expect(languageName("Klingon")).toBe("Klingon")
  })
})
