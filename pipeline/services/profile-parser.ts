import { load, type Cheerio } from "cheerio";
import type { Element } from "domhandler";
import type {
  RecordIdentifier,
  ScrapedRecord
} from "../../packages/shared/src/contracts.js";
import { normalizeWhitespace, uniqueInOrder } from "../../packages/shared/src/text-utils.js";
import { canonicalizeRecordUrl } from "../utils/record-identifier.js";

// ---------------------------------------------------------------------------
// Field reader
// ---------------------------------------------------------------------------

/**
 * Read-only view of a rendered page. A selector that matches nothing reads as
 * an empty string or an empty list, never as an error.
 */
export interface FieldReader {
  text(selector: string): string;
  texts(selector: string): string[];
  items(selector: string): FieldReader[];
  attributes(selector: string, attributeName: string): string[];
}

type FindElements = (selector: string) => Cheerio<Element>;

class CheerioFieldReader implements FieldReader {
  private readonly find: FindElements;

  private readonly wrap: (element: Element) => Cheerio<Element>;

  constructor(find: FindElements, wrap: (element: Element) => Cheerio<Element>) {
    this.find = find;
    this.wrap = wrap;
  }

  text(selector: string): string {
    return normalizeWhitespace(this.find(selector).first().text());
  }

  texts(selector: string): string[] {
    return this.find(selector)
      .toArray()
      .map((element) => normalizeWhitespace(this.wrap(element).text()))
      .filter(Boolean);
  }

  items(selector: string): FieldReader[] {
    return this.find(selector)
      .toArray()
      .map((element) => {
        const scope = this.wrap(element);
        return new CheerioFieldReader((inner) => scope.find(inner), this.wrap);
      });
  }

  attributes(selector: string, attributeName: string): string[] {
    return this.find(selector)
      .toArray()
      .map((element) => this.wrap(element).attr(attributeName)?.trim() ?? "")
      .filter(Boolean);
  }
}

export const createFieldReader = (html: string): FieldReader => {
  const $ = load(html);
  return new CheerioFieldReader(
    (selector) => $.root().find(selector),
    (element) => $(element)
  );
};

// ---------------------------------------------------------------------------
// Selector table
// ---------------------------------------------------------------------------

export interface ProfileSelectors {
  name: string;
  headline: string;
  location: string;
  about: string;
  experience: {
    item: string;
    title: string;
    company: string;
    dates: string;
    location: string;
    description: string;
  };
  education: {
    item: string;
    school: string;
    degree: string;
    dates: string;
  };
  skills: string;
  certifications: {
    item: string;
    name: string;
    issuer: string;
    date: string;
  };
  languages: string;
  /** Progressive-disclosure controls clicked, when present, before reading. */
  expanders: string[];
}

const ENTRY_TITLE = "div.display-flex span[aria-hidden='true']";
const ENTRY_SUBTITLE = "span.t-14.t-normal span[aria-hidden='true']";
const ENTRY_CAPTION = "span.t-14.t-normal.t-black--light span[aria-hidden='true']";
const ENTRY_SECOND_CAPTION =
  "span.t-14.t-normal.t-black--light ~ span.t-14.t-normal.t-black--light span[aria-hidden='true']";

const sectionItems = (section: string): string =>
  `section[data-section='${section}'] li.artdeco-list__item`;

export const DEFAULT_PROFILE_SELECTORS: ProfileSelectors = {
  name: "h1.text-heading-xlarge",
  headline: "div.text-body-medium",
  location: "span.text-body-small",
  about: "section[data-section='summary'] div.display-flex.ph5.pv3",
  experience: {
    item: sectionItems("experience"),
    title: ENTRY_TITLE,
    company: ENTRY_SUBTITLE,
    dates: ENTRY_CAPTION,
    location: ENTRY_SECOND_CAPTION,
    description: "div.inline-show-more-text span[aria-hidden='true']"
  },
  education: {
    item: sectionItems("education"),
    school: ENTRY_TITLE,
    degree: ENTRY_SUBTITLE,
    dates: ENTRY_CAPTION
  },
  skills: `${sectionItems("skills")} ${ENTRY_TITLE}`,
  certifications: {
    item: sectionItems("certifications"),
    name: ENTRY_TITLE,
    issuer: ENTRY_SUBTITLE,
    date: ENTRY_CAPTION
  },
  languages: `${sectionItems("languages")} ${ENTRY_TITLE}`,
  expanders: [
    "button[aria-label*='more about']",
    "section[data-section='experience'] button[aria-label*='Show all']",
    "section[data-section='skills'] button[aria-label*='Show all']",
    "section[data-section='certifications'] button[aria-label*='Show all']"
  ]
};

// ---------------------------------------------------------------------------
// Parsers
// ---------------------------------------------------------------------------

const hasContent = (entry: object): boolean =>
  Object.values(entry).some((value) => value !== "");

export const readProfile = (
  reader: FieldReader,
  identifier: RecordIdentifier,
  scrapedAt: string,
  selectors: ProfileSelectors = DEFAULT_PROFILE_SELECTORS
): ScrapedRecord => {
  const { experience, education, certifications } = selectors;

  return {
    profile_url: identifier,
    scraped_at: scrapedAt,
    name: reader.text(selectors.name),
    headline: reader.text(selectors.headline),
    location: reader.text(selectors.location),
    about: reader.text(selectors.about),
    experience: reader
      .items(experience.item)
      .map((item) => ({
        title: item.text(experience.title),
        company: item.text(experience.company),
        dates: item.text(experience.dates),
        location: item.text(experience.location),
        description: item.text(experience.description)
      }))
      .filter(hasContent),
    education: reader
      .items(education.item)
      .map((item) => ({
        school: item.text(education.school),
        degree: item.text(education.degree),
        dates: item.text(education.dates)
      }))
      .filter(hasContent),
    skills: uniqueInOrder(reader.texts(selectors.skills)),
    certifications: reader
      .items(certifications.item)
      .map((item) => ({
        name: item.text(certifications.name),
        issuer: item.text(certifications.issuer),
        date: item.text(certifications.date)
      }))
      .filter(hasContent),
    languages: uniqueInOrder(reader.texts(selectors.languages))
  };
};

export const parseProfilePage = (
  html: string,
  identifier: RecordIdentifier,
  scrapedAt: string,
  selectors: ProfileSelectors = DEFAULT_PROFILE_SELECTORS
): ScrapedRecord => readProfile(createFieldReader(html), identifier, scrapedAt, selectors);

/**
 * Candidate record links on a listing page, canonicalized, in document order.
 * Duplicates are kept; callers decide how to merge them.
 */
export const parseRecordLinks = (
  html: string,
  pageUrl: string,
  recordPathPattern: RegExp
): RecordIdentifier[] => {
  const identifiers: RecordIdentifier[] = [];

  for (const href of createFieldReader(html).attributes("a[href]", "href")) {
    const identifier = canonicalizeRecordUrl(href, pageUrl);
    if (identifier && recordPathPattern.test(new URL(identifier).pathname)) {
      identifiers.push(identifier);
    }
  }

  return identifiers;
};
