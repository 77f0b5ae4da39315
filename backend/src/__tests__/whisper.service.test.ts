import { describe, expect, it } from "vitest";
import { ProcessingError } from "../errors";
import { buildFfmpegArgs, buildWhisperArgs, mapWhisperOutput, parseWhisperOutput, tokensToWords } from "../whisper.service";
import type { WhisperOutput } from "../whisper.service";
import { makeParams } from "./helpers";

const output: WhisperOutput = {
  model: { type: "base" },
  result: { language: "pt" },
  transcription: [
    {
      offsets: { from: 0, to: 1500 },
      text: " Ola mundo",
      tokens: [
        { text: "[_BEG_]", offsets: { from: 0, to: 0 }, p: 0.9 },
        { text: " Ola", offsets: { from: 0, to: 600 }, p: 0.5 },
        { text: " mun", offsets: { from: 600, to: 1000 }, p: 1 },
        { text: "do", offsets: { from: 1000, to: 1500 }, p: 0.5 }
      ],
      speaker_turn_next: true
    },
    {
      offsets: { from: 1500, to: 3000 },
      text: " Tudo bem [SPEAKER_TURN]",
      tokens: [
        { text: " Tudo", offsets: { from: 1500, to: 2000 }, p: 1 },
        { text: " bem", offsets: { from: 2000, to: 3000 }, p: 1 }
      ]
    }
  ]
};

describe("mapWhisperOutput", () => {
  it("monta texto, segmentos e confianca media", () => {
    const result = mapWhisperOutput(output, makeParams(), { duration: 3, model: "ggml-base" });

    expect(result.text).toBe("Ola mundo Tudo bem");
    expect(result.language).toBe("pt");
    expect(result.model).toBe("base");
    expect(result.duration).toBe(3);
    expect(result.wordTimestamps).toBe(false);
    expect(result.confidence).toBeCloseTo(0.8);
    expect(result.segments).toEqual([
      { id: 0, start: 0, end: 1.5, text: "Ola mundo" },
      { id: 1, start: 1.5, end: 3, text: "Tudo bem" }
    ]);
    expect(result.diarization).toBeUndefined();
  });

  it("inclui palavras e falantes quando pedido", () => {
    const result = mapWhisperOutput(output, makeParams({ wordTimestamps: true, enableDiarization: true }), {
      duration: 3,
      model: "ggml-base"
    });

    expect(result.segments[0]).toEqual({
      id: 0,
      start: 0,
      end: 1.5,
      text: "Ola mundo",
      speaker: "SPEAKER_00",
      words: [
        { word: "Ola", start: 0, end: 0.6, probability: 0.5, speaker: "SPEAKER_00" },
        { word: "mundo", start: 0.6, end: 1.5, probability: 0.75, speaker: "SPEAKER_00" }
      ]
    });
    expect(result.segments[1].speaker).toBe("SPEAKER_01");
    expect(result.diarization).toEqual({ numSpeakers: 2, speakers: ["SPEAKER_00", "SPEAKER_01"] });
  });

  it("volta ao primeiro falante ao atingir maxSpeakers", () => {
    const result = mapWhisperOutput(output, makeParams({ enableDiarization: true, maxSpeakers: 1 }), {
      duration: 3,
      model: "ggml-base"
    });

    expect(result.segments.map((segment) => segment.speaker)).toEqual(["SPEAKER_00", "SPEAKER_00"]);
    expect(result.diarization).toEqual({ numSpeakers: 1, speakers: ["SPEAKER_00"] });
  });

  it("usa o idioma pedido e o nome do arquivo de modelo como reserva", () => {
    const result = mapWhisperOutput({ transcription: [] }, makeParams({ language: "es" }), {
      duration: 0,
      model: "ggml-small"
    });

    expect(result).toMatchObject({ text: "", language: "es", model: "ggml-small", confidence: 0, segments: [] });
  });
});

describe("tokensToWords", () => {
  it("descarta tokens especiais e palavras vazias", () => {
    expect(
      tokensToWords([
        { text: "[_TT_150]", offsets: { from: 0, to: 0 } },
        { text: " ", offsets: { from: 0, to: 10 } },
        { text: " sim", offsets: { from: 10, to: 200 } }
      ])
    ).toEqual([{ word: "sim", start: 0.01, end: 0.2, probability: 0 }]);
  });
});

describe("argumentos das ferramentas", () => {
  const config = { whisperPath: "whisper-cli", modelPath: "/models/ggml-base.bin", ffmpegPath: "ffmpeg", threads: 4 };

  it("monta a chamada do whisper-cli", () => {
    expect(
      buildWhisperArgs(
        config,
        makeParams({ language: "pt", task: "translate", beamSize: 3, enableDiarization: true }),
        "/tmp/in.wav",
        "/tmp/out"
      )
    ).toEqual([
      "-m", "/models/ggml-base.bin",
      "-f", "/tmp/in.wav",
      "-l", "pt",
      "-bs", "3",
      "-t", "4",
      "-ojf",
      "-of", "/tmp/out",
      "-np",
      "-tr",
      "-tdrz"
    ]);
  });

  it("detecta o idioma quando nao informado", () => {
    const args = buildWhisperArgs(config, makeParams(), "/tmp/in.wav", "/tmp/out");
    expect(args[args.indexOf("-l") + 1]).toBe("auto");
    expect(args).not.toContain("-tr");
  });

  it("so aplica o filtro de silencio com vadFilter", () => {
    expect(buildFfmpegArgs("a.mp3", "out.wav", makeParams({ vadFilter: false }))).toEqual([
      "-y", "-i", "a.mp3", "-ac", "1", "-ar", "16000", "-c:a", "pcm_s16le", "out.wav"
    ]);
    expect(buildFfmpegArgs("a.mp3", "out.wav", makeParams())).toContain("-af");
  });
});

describe("parseWhisperOutput", () => {
  it("rejeita saida invalida", () => {
    expect(() => parseWhisperOutput("nao e json")).toThrow(ProcessingError);
    expect(() => parseWhisperOutput("nao e json")).toThrow("Saida do whisper nao e um JSON valido.");
    expect(() => parseWhisperOutput(JSON.stringify({ result: {} }))).toThrow(ProcessingError);
  });

  it("aceita a saida completa do whisper-cli", () => {
    expect(parseWhisperOutput(JSON.stringify(output)).transcription).toHaveLength(2);
  });
});
