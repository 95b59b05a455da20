/**
 * Sign-in page candidates
 *
 * Ordered highest priority first. Selectors are tried until one is visible.
 */

import { defineCandidate } from "@/core/domain/Candidate";

export const AUTH_SELECTORS = {
  signInLink: defineCandidate("auth.signInLink", [
    "#nav-link-accountList",
    "a[href*='signin']",
    "#nav-signin-tooltip a",
    ".nav-signin-tooltip a",
  ]),

  email: defineCandidate("auth.email", [
    "#ap_email",
    "input[name='email']",
    "input[type='email']",
    "#ap_email_login",
  ]),

  continueButton: defineCandidate("auth.continue", [
    "#continue",
    "input[id='continue']",
    "button[type='submit']",
  ]),

  password: defineCandidate("auth.password", [
    "#ap_password",
    "input[name='password']",
    "input[type='password']",
  ]),

  submitButton: defineCandidate("auth.submit", [
    "#signInSubmit",
    "input[id='signInSubmit']",
    "button[type='submit']",
    "#auth-signin-button",
  ]),

  // challenges: probed for visibility only, never filled
  captcha: defineCandidate("auth.captcha", [
    "#auth-captcha-image",
    "[name='cvf_captcha_input']",
    ".cvf-captcha-img",
    "#captchacharacters",
  ]),

  mfa: defineCandidate("auth.mfa", [
    "#auth-mfa-form",
    "[name='otpCode']",
    "#auth-mfa-otpcode",
    ".cvf-challenge-form",
  ]),

  loginError: defineCandidate("auth.loginError", [
    ".a-alert-error",
    "#auth-error-message-box",
    ".auth-error-message",
  ]),

  greeting: defineCandidate("auth.greeting", [
    "#nav-link-accountList-nav-line-1",
    "#nav-link-accountList span",
    ".nav-line-1",
  ]),
} as const;

/** Greeting text shown to a signed-in account ("Hello, Sam") */
const GREETING_MARKER = /\b(Hello|Hi)\b/;

/** Signed-out variant of the same element ("Hello, sign in") */
const SIGNED_OUT_MARKER = /\bsign\s*in\b/i;

export function isSignedInGreeting(text: string): boolean {
  return GREETING_MARKER.test(text) && !SIGNED_OUT_MARKER.test(text);
}
