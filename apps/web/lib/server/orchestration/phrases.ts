import type { ErrorKind } from "@shirtsmith/contracts";

export const RESPONSE_PHRASES = [
  "Got you fam! 🔥",
  "Say less, squad! 💪",
  "Bet! Your fit is ready! 👕",
  "No cap, this tee slaps! 🎯",
  "It's giving main character energy! ✨",
  "Chef's kiss on this one! 👨‍🍳",
  "Your drip has arrived! 💧",
  "Sheesh, this goes hard! 🔥",
  "We understood the assignment! 📝",
  "Straight bussin'! 💯"
] as const;

export const TEXT_ONLY_NOTE = "Artwork isn't available yet, so this one is text only.";

export const FAILURE_TEXT: Record<ErrorKind, string> = {
  render_failure: "Couldn't draw that design this time. Try a different wording?",
  fulfillment_failure: "The print shop didn't take the order. Give it another go in a bit!",
  internal_error: "Oof, something broke on our end! Try again later."
};

export type PhrasePicker = (pool: readonly string[]) => string;

export const pickRandomPhrase: PhrasePicker = (pool) =>
  pool[Math.floor(Math.random() * pool.length)] ?? pool[0] ?? "Done!";
