// shared/password.ts — Root password policy, generation and validation

import { randomInt } from "node:crypto";
import { PasswordPolicyError } from "../errors";

export const UPPER = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";
export const LOWER = "abcdefghijklmnopqrstuvwxyz";
export const DIGITS = "0123456789";
export const SYMBOLS = "!@#$%^&*()_+-=";

const CLASSES = [
  ["uppercase letter", UPPER],
  ["lowercase letter", LOWER],
  ["digit", DIGITS],
  ["symbol", SYMBOLS],
] as const;

export interface PasswordPolicy {
  minLength: number;
  maxLength: number;
  /** Minimum characters required from each of the four classes. */
  minPerClass: number;
  /** Length of generated passwords. */
  targetLength: number;
  /** Longest allowed run of one repeated character. */
  maxRepeat: number;
}

export const DEFAULT_PASSWORD_POLICY: Readonly<PasswordPolicy> = Object.freeze({
  minLength: 12,
  maxLength: 64,
  minPerClass: 3,
  targetLength: 24,
  maxRepeat: 2,
});

/** Uniform integer in [0, max). */
export type RandomSource = (max: number) => number;

export const cryptoRandom: RandomSource = (max) => randomInt(max);

/** Every rule the password breaks; empty when it complies. */
export function passwordViolations(password: string, policy: PasswordPolicy = DEFAULT_PASSWORD_POLICY): string[] {
  const violations: string[] = [];
  if (password.length < policy.minLength) {
    violations.push(`at least ${policy.minLength} characters`);
  }
  if (password.length > policy.maxLength) {
    violations.push(`at most ${policy.maxLength} characters`);
  }
  for (const [name, chars] of CLASSES) {
    const count = [...password].filter((c) => chars.includes(c)).length;
    if (count < policy.minPerClass) {
      violations.push(`at least ${policy.minPerClass} ${name}${policy.minPerClass === 1 ? "" : "s"}`);
    }
  }
  const allowed = UPPER + LOWER + DIGITS + SYMBOLS;
  if ([...password].some((c) => !allowed.includes(c))) {
    violations.push(`only letters, digits and ${SYMBOLS}`);
  }
  if (new RegExp(`(.)\\1{${policy.maxRepeat}}`).test(password)) {
    violations.push(`no character repeated more than ${policy.maxRepeat} times in a row`);
  }
  return violations;
}

export function validatePassword(password: string, policy: PasswordPolicy = DEFAULT_PASSWORD_POLICY): void {
  const violations = passwordViolations(password, policy);
  if (violations.length > 0) {
    throw new PasswordPolicyError(violations);
  }
}

function pick(chars: string, random: RandomSource): string {
  return chars[random(chars.length)];
}

/**
 * Replace the last character of any run longer than `maxRepeat` with a
 * different one from the same class, so class counts are unchanged.
 */
function breakRuns(chars: string[], maxRepeat: number, random: RandomSource): void {
  if (maxRepeat < 1) {
    return;
  }
  for (let i = maxRepeat; i < chars.length; i++) {
    const c = chars[i];
    if (chars.slice(i - maxRepeat, i).some((prev) => prev !== c)) {
      continue;
    }
    const set = CLASSES.find(([, members]) => members.includes(c))?.[1] ?? UPPER;
    const choices = [...set].filter((x) => x !== c && x !== chars[i + 1]);
    chars[i] = pick(choices.join(""), random);
  }
}

/** One candidate: class minimums plus a random suffix, Fisher-Yates shuffled, runs broken up. */
export function candidatePassword(policy: PasswordPolicy, random: RandomSource): string {
  const chars: string[] = [];
  for (const [, set] of CLASSES) {
    for (let i = 0; i < policy.minPerClass; i++) {
      chars.push(pick(set, random));
    }
  }
  const alphabet = UPPER + LOWER + DIGITS + SYMBOLS;
  while (chars.length < policy.targetLength) {
    chars.push(pick(alphabet, random));
  }
  for (let i = chars.length - 1; i > 0; i--) {
    const j = random(i + 1);
    [chars[i], chars[j]] = [chars[j], chars[i]];
  }
  breakRuns(chars, policy.maxRepeat, random);
  return chars.join("");
}

/**
 * Generate a compliant password. A failing candidate is regenerated once;
 * a second failure raises PasswordPolicyError.
 */
export function generatePassword(
  policy: PasswordPolicy = DEFAULT_PASSWORD_POLICY,
  random: RandomSource = cryptoRandom,
): string {
  const first = candidatePassword(policy, random);
  try {
    validatePassword(first, policy);
    return first;
  } catch (err) {
    if (!(err instanceof PasswordPolicyError)) {
      throw err;
    }
  }
  const second = candidatePassword(policy, random);
  validatePassword(second, policy);
  return second;
}
