import * as cheerio from "cheerio";
import { FetchStrategy, StrategyHint } from "../../../core/records";
import { tryDomainOf } from "../../../common/helpers/url.helper";

/**
 * Marketplaces that only render listings client-side
 */
export const HEAVY_JS_DOMAINS = [
  "upwork.com",
  "malt.fr",
  "fiverr.com",
  "freelancer.com",
  "toptal.com",
  "peopleperhour.com",
  "guru.com",
];

const MOUNT_POINTS = [
  "#root",
  "#app",
  "#__next",
  "#__nuxt",
  "app-root",
  "[ng-app]",
  "[data-reactroot]",
];

const NOSCRIPT_NOTICE =
  /enable javascript|javascript is required|requires javascript|activer (le )?javascript/i;

const CHALLENGE_MARKUP = [
  "#challenge-form",
  "#cf-challenge-running",
  ".cf-browser-verification",
  "#px-captcha",
  "#captcha-container",
];

const CHALLENGE_NOTICE =
  /verify (that )?you are (a )?human|are you a robot|checking (if the site connection is secure|your browser)|attention required|captcha|access denied|v[ée]rifi\w* que vous [êe]tes (un )?humain|acc[èe]s refus[ée]/i;

// notices only count on pages this short
const CHALLENGE_MAX_TEXT_LENGTH = 600;

export interface StaticContentAssessment {
  visibleTextLength: number;
  clientShell: boolean;
  /** bot-protection interstitial instead of the requested page */
  antiBot: boolean;
  empty: boolean;
}

/**
 * Strategy to try first. Explicit hints are honoured as-is; `auto` starts
 * static except on domains known to need rendering.
 */
export function selectInitialStrategy(
  hint: StrategyHint,
  url: string,
): FetchStrategy {
  if (hint !== "auto") {
    return hint;
  }
  const domain = tryDomainOf(url);
  if (
    domain &&
    HEAVY_JS_DOMAINS.some((d) => domain === d || domain.endsWith(`.${d}`))
  ) {
    return "dynamic";
  }
  return "static";
}

/**
 * Decide whether a static result looks like an empty page or a
 * client-rendered shell that needs escalation to rendering.
 */
export function assessStaticContent(
  html: string,
  minTextLength: number,
): StaticContentAssessment {
  const $ = cheerio.load(html);
  const noscriptText = $("noscript").text();
  $("script, style, noscript, template, svg").remove();

  const visibleText = $("body").text().replace(/\s+/g, " ").trim();
  const visibleTextLength = visibleText.length;

  const emptyMountPoint = MOUNT_POINTS.some((selector) => {
    const node = $(selector).first();
    return node.length > 0 && node.text().trim().length === 0;
  });
  const clientShell = emptyMountPoint || NOSCRIPT_NOTICE.test(noscriptText);

  const antiBot = detectChallenge($, visibleText);

  return {
    visibleTextLength,
    clientShell,
    antiBot,
    empty: visibleTextLength < minTextLength || clientShell || antiBot,
  };
}

/**
 * True when the markup is a bot-protection or CAPTCHA interstitial
 */
export function isAntiBotChallenge(html: string): boolean {
  const $ = cheerio.load(html);
  $("script, style, noscript, template, svg").remove();
  return detectChallenge($, $("body").text().replace(/\s+/g, " ").trim());
}

function detectChallenge($: cheerio.CheerioAPI, visibleText: string): boolean {
  if (CHALLENGE_MARKUP.some((selector) => $(selector).length > 0)) {
    return true;
  }
  if (visibleText.length > CHALLENGE_MAX_TEXT_LENGTH) {
    return false;
  }
  return CHALLENGE_NOTICE.test(`${$("title").text()} ${visibleText}`);
}

export function shouldEscalate(
  hint: StrategyHint,
  assessment: StaticContentAssessment,
): boolean {
  return hint === "auto" && assessment.empty;
}
