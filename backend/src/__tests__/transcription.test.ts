import { describe, expect, it } from "vitest";
import { ParamsValidationError } from "../errors";
import { SUPPORTED_LANGUAGES, isSupportedLanguage, parseFormParams, parseTranscriptionParams } from "../transcription";

describe("parseTranscriptionParams", () => {
  it("aplica os valores padrao", () => {
    expect(parseTranscriptionParams({})).toEqual({
      language: null,
      task: "transcribe",
      beamSize: 5,
      vadFilter: true,
      wordTimestamps: false,
      enableDiarization: false,
      minSpeakers: null,
      maxSpeakers: null
    });
  });

  it("devolve um objeto congelado", () => {
    const params = parseTranscriptionParams({ language: "pt" });
    expect(Object.isFrozen(params)).toBe(true);
  });

  it("rejeita beamSize fora de 1-10", () => {
    expect(() => parseTranscriptionParams({ beamSize: 11 })).toThrow(ParamsValidationError);
    expect(() => parseTranscriptionParams({ beamSize: 0 })).toThrow("beamSize: beamSize deve estar entre 1 e 10");
  });

  it("aceita apenas idiomas suportados", () => {
    expect(parseTranscriptionParams({ language: " PT " })).toMatchObject({ language: "pt" });
    expect(parseTranscriptionParams({ language: "haw" })).toMatchObject({ language: "haw" });
    expect(() => parseTranscriptionParams({ language: "klingon" })).toThrow(
      "Parametros invalidos: language: idioma nao suportado: klingon"
    );
  });

  it("rejeita tarefa desconhecida e campos extras", () => {
    expect(() => parseTranscriptionParams({ task: "summarize" })).toThrow(ParamsValidationError);
    expect(() => parseTranscriptionParams({ temperature: 0.3 })).toThrow(ParamsValidationError);
  });

  it("exige minSpeakers <= maxSpeakers", () => {
    expect(() => parseTranscriptionParams({ minSpeakers: 4, maxSpeakers: 2 })).toThrow(
      "minSpeakers: minSpeakers nao pode ser maior que maxSpeakers"
    );
    expect(parseTranscriptionParams({ minSpeakers: 2, maxSpeakers: 2 })).toMatchObject({ minSpeakers: 2, maxSpeakers: 2 });
  });
});

describe("parseFormParams", () => {
  it("converte os campos de texto do formulario", () => {
    const params = parseFormParams(
      {
        language: "en",
        task: "translate",
        beamSize: "3",
        vadFilter: "false",
        wordTimestamps: "true",
        enableDiarization: "1",
        minSpeakers: "",
        maxSpeakers: "3"
      },
      "entrevista.mp3"
    );

    expect(params).toEqual({
      language: "en",
      task: "translate",
      beamSize: 3,
      vadFilter: false,
      wordTimestamps: true,
      enableDiarization: true,
      minSpeakers: null,
      maxSpeakers: 3,
      originalFilename: "entrevista.mp3"
    });
  });

  it("trata campos vazios como nao informados", () => {
    expect(parseFormParams({ language: "", beamSize: "" })).toMatchObject({ language: null, beamSize: 5 });
  });

  it("ignora campos desconhecidos do formulario", () => {
    expect(parseFormParams({ foo: "bar" })).toMatchObject({ task: "transcribe" });
  });

  it("rejeita booleanos e inteiros mal formados", () => {
    expect(() => parseFormParams({ vadFilter: "talvez" })).toThrow(ParamsValidationError);
    expect(() => parseFormParams({ beamSize: "3.5" })).toThrow(ParamsValidationError);
  });
});

describe("SUPPORTED_LANGUAGES", () => {
  it("nao tem codigos repetidos", () => {
    expect(new Set(SUPPORTED_LANGUAGES).size).toBe(SUPPORTED_LANGUAGES.length);
    expect(isSupportedLanguage("en")).toBe(true);
    expect(isSupportedLanguage("auto")).toBe(false);
  });
});
