/**
 * Prompt builders for the GEMBA family and Structured-DA.
 * Pure functions: no I/O, no hidden state; texts and language names are interpolated as-is.
 */

import type { ChatMessage } from "../gateway/types.js";
import type { ScoreRequest } from "./types.js";

const MQM_CATEGORIES =
  "The categories of errors are: accuracy (addition, mistranslation, omission, untranslated text), " +
  "fluency (character encoding, grammar, inconsistency, punctuation, register, spelling), " +
  "style (awkward), terminology (inappropriate for context, inconsistent use), non-translation, other, or no-error.";

const IDENTIFY_ERRORS =
  "Based on the source segment and machine translation surrounded with triple backticks, " +
  "identify error types in the translation and classify them.";

function fencedPair(req: ScoreRequest): string {
  return [
    `${req.sourceLang} source:`,
    "```" + req.sourceText + "```",
    `${req.targetLang} translation:`,
    "```" + req.targetText + "```",
  ].join("\n");
}

// ─── GEMBA-DA ────────────────────────────────────────────────────────────────

export function gembaDaPrompt(req: ScoreRequest): string {
  return [
    `Score the following translation from ${req.sourceLang} to ${req.targetLang} on a continuous scale from 0 to 100, ` +
      `where a score of zero means "no meaning preserved" and score of one hundred means "perfect meaning and grammar".`,
    "",
    `${req.sourceLang} source: "${req.sourceText}"`,
    `${req.targetLang} translation: "${req.targetText}"`,
    "Score:",
  ].join("\n");
}

// ─── GEMBA-MQM ───────────────────────────────────────────────────────────────

export const MQM_SYSTEM_PROMPT =
  "You are an expert MQM evaluator. Identify translation errors and output a holistic quality score " +
  'on a 0-100 scale (0 = unusable, 100 = perfect). Return ONLY JSON: {"score": number, ' +
  '"analysis": string describing notable errors}.';

export const MQM_FEW_SHOT_USER = [
  "English source:",
  "```Hello world.```",
  "German translation:",
  "```Hallo Welt.```",
  "",
  IDENTIFY_ERRORS,
].join("\n");

export const MQM_FEW_SHOT_ASSISTANT = '{"score": 100, "analysis": "No errors detected; translation is perfect."}';

export function gembaMqmFinalUser(req: ScoreRequest): string {
  return [
    fencedPair(req),
    "",
    `${IDENTIFY_ERRORS} ${MQM_CATEGORIES} ` +
      "Each error is classified as one of three categories: critical, major, and minor. " +
      "Critical errors inhibit comprehension of the text. Major errors disrupt the flow, but what the text is " +
      "trying to say is still understandable. Minor errors are technically errors, but do not disrupt the flow " +
      "or hinder comprehension.",
  ].join("\n");
}

/** System instruction, one-shot exchange, then the request. */
export function gembaMqmMessages(req: ScoreRequest): ChatMessage[] {
  return [
    { role: "system", content: MQM_SYSTEM_PROMPT },
    { role: "user", content: MQM_FEW_SHOT_USER },
    { role: "assistant", content: MQM_FEW_SHOT_ASSISTANT },
    { role: "user", content: gembaMqmFinalUser(req) },
  ];
}

// ─── GEMBA-ESA ───────────────────────────────────────────────────────────────

export function gembaEsaErrorPrompt(req: ScoreRequest): string {
  return [
    fencedPair(req),
    "",
    `${IDENTIFY_ERRORS} ${MQM_CATEGORIES} ` +
      "Each error is classified as one of two categories: major or minor. Major errors disrupt the flow and " +
      "make the understandability of text difficult or impossible. Minor errors are errors that do not disrupt " +
      "the flow significantly and what the text is trying to say is still understandable.",
  ].join("\n");
}

/** `errors` is the first call's raw output, embedded verbatim. */
export function gembaEsaScoringPrompt(req: ScoreRequest, errors: string): string {
  return [
    `Given the translation from ${req.sourceLang} to ${req.targetLang} and the annotated error spans, ` +
      "assign a score on a continuous scale from 0 to 100. The scale has following reference points: " +
      '0="No meaning preserved", 33="Some meaning preserved", 66="Most meaning preserved and few grammar mistakes", ' +
      'up to 100="Perfect meaning and grammar".',
    "",
    `Score the following translation from ${req.sourceLang} source:`,
    "```" + req.sourceText + "```",
    `${req.targetLang} translation:`,
    "```" + req.targetText + "```",
    "Annotated error spans:",
    "```" + errors + "```",
    "Score (0-100):",
  ].join("\n");
}

// ─── STRUCTURED-DA ───────────────────────────────────────────────────────────

export const STRUCTURED_DA_SYSTEM_PROMPT =
  "You are an expert bilingual evaluator of machine translation quality. Be strict but fair.";

export function structuredDaUserPrompt(req: ScoreRequest): string {
  return [
    `Evaluate the quality of the following machine translation from ${req.sourceLang} to ${req.targetLang}.`,
    "Return ONLY a JSON object with these fields:",
    "score: holistic quality 0-100 (float)",
    "adequacy: semantic accuracy and completeness 0-5 (float, where 5 = perfect meaning preservation)",
    "fluency: grammatical correctness and naturalness 0-5 (float, where 5 = perfect native fluency)",
    "rationale: brief explanation of the score (1-2 sentences)",
    "",
    `${req.sourceLang} source: ${req.sourceText}`,
    `${req.targetLang} hypothesis: ${req.targetText}`,
    "",
    "IMPORTANT: Output valid JSON only, no markdown fences or extra text.",
  ].join("\n");
}

export function structuredDaMessages(req: ScoreRequest): ChatMessage[] {
  return [
    { role: "system", content: STRUCTURED_DA_SYSTEM_PROMPT },
    { role: "user", content: structuredDaUserPrompt(req) },
  ];
}
