/**
 * ASS Script Service
 * Turns subtitle and caption cues into an ASS document for the subtitles filter
 */

import { formatAssTimestamp, sortSubtitles, toRelativeMs, type Subtitle } from "../models/subtitle.model";
import { buildAssStyleHeader, buildAssStyleLine, type TextStyle } from "../models/text-style.model";

export interface AssCaption {
  cue: Subtitle;
  style: TextStyle;
}

export interface AssScriptInput {
  subtitles: readonly Subtitle[];
  /** Absolute source time that maps to 0:00:00.00 in the script */
  clipStartMs: number;
  subtitleStyle: TextStyle;
  /** Final frame size, including any caption padding */
  playResX: number;
  playResY: number;
  caption?: AssCaption;
}

const EVENTS_FORMAT = "Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text";

/**
 * Join display lines with the ASS forced line break
 */
function toDialogueText(lines: readonly string[]): string {
  return lines.map((line) => line.replace(/\r?\n/g, "\\N")).join("\\N");
}

export function buildDialogueLine(cue: Subtitle, clipStartMs: number, style: TextStyle): string {
  const start = formatAssTimestamp(toRelativeMs(cue.startMs + cue.delayMs, clipStartMs));
  const end = formatAssTimestamp(toRelativeMs(cue.endMs, clipStartMs));
  return `Dialogue: 0,${start},${end},${style.name},,${style.marginL},${style.marginR},${style.marginV},,${toDialogueText(cue.text)}`;
}

export function buildScriptInfo(playResX: number, playResY: number): string {
  return ["[Script Info]", "ScriptType: v4.00+", `PlayResX: ${playResX}`, `PlayResY: ${playResY}`, "WrapStyle: 0"].join(
    "\n"
  );
}

export function buildAssScript(input: AssScriptInput): string {
  const styles = [input.subtitleStyle];
  if (input.caption) {
    styles.push(input.caption.style);
  }

  const dialogues = sortSubtitles(input.subtitles).map((cue) =>
    buildDialogueLine(cue, input.clipStartMs, input.subtitleStyle)
  );
  if (input.caption) {
    dialogues.push(buildDialogueLine(input.caption.cue, input.clipStartMs, input.caption.style));
  }

  return [
    buildScriptInfo(input.playResX, input.playResY),
    "",
    buildAssStyleHeader(),
    ...styles.map(buildAssStyleLine),
    "",
    "[Events]",
    EVENTS_FORMAT,
    ...dialogues,
    "",
  ].join("\n");
}

export interface ParsedDialogue {
  start: string;
  end: string;
  style: string;
  text: string;
}

/**
 * Read back the Dialogue lines of an ASS document. Text may itself contain commas.
 */
export function parseAssDialogues(script: string): ParsedDialogue[] {
  const dialogues: ParsedDialogue[] = [];
  for (const line of script.split(/\r?\n/)) {
    if (!line.startsWith("Dialogue:")) continue;
    const fields = line.slice("Dialogue:".length).trimStart().split(",");
    if (fields.length < 10) continue;
    dialogues.push({
      start: fields[1],
      end: fields[2],
      style: fields[3],
      text: fields.slice(9).join(","),
    });
  }
  return dialogues;
}
