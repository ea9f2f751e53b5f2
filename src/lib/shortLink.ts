import { randomInt } from "node:crypto";

export const SHORT_LINK_LENGTH = 6;
const ALPHABET = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

export const randomShortLink = (): string => {
  let out = "";
  for (let i = 0; i < SHORT_LINK_LENGTH; i++) {
    out += ALPHABET.charAt(randomInt(ALPHABET.length));
  }
  return out;
};

/** Draws candidates until one is not taken. */
export const generateShortLink = async (
  isTaken: (hash: string) => Promise<boolean>,
  draw: () => string = randomShortLink
): Promise<string> => {
  for (;;) {
    const candidate = draw();
    if (!(await isTaken(candidate))) return candidate;
  }
};

export const shortLinkUrl = (baseUrl: string, hash: string) =>
  `${baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`}${hash}`;
