import { randomInt } from "node:crypto";

export const API_KEY_LENGTH = 32;
const API_KEY_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";

export function generateApiKey(length = API_KEY_LENGTH): string {
  let key = "";
  for (let i = 0; i < length; i++) {
    key += API_KEY_ALPHABET[randomInt(API_KEY_ALPHABET.length)];
  }
  return key;
}
