// src/util/accounts.ts

export const MIN_USERNAME_LEN = 3;
export const MAX_USERNAME_LEN = 30;
export const MIN_PASSWORD_LEN = 6;

const USERNAME_CHARS = /^[A-Za-z0-9_-]+$/;

/** Error text for the signup form, or null when the username is fine. */
export function validateUsername(raw: string): string | null {
  const username = (raw || "").trim();
  if (!username) return "Username is required.";
  if (username.length < MIN_USERNAME_LEN) {
    return `Username must be at least ${MIN_USERNAME_LEN} characters.`;
  }
  if (username.length > MAX_USERNAME_LEN) {
    return `Username must be at most ${MAX_USERNAME_LEN} characters.`;
  }
  if (!USERNAME_CHARS.test(username)) {
    return "Username can only contain letters, numbers, hyphens, and underscores.";
  }
  return null;
}

export function validatePassword(password: string): string | null {
  if (!password) return "Password is required.";
  if (password.length < MIN_PASSWORD_LEN) {
    return `Password must be at least ${MIN_PASSWORD_LEN} characters.`;
  }
  return null;
}
