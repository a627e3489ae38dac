export const DEFAULT_HTTP_TIMEOUT = 30000;
export const DEFAULT_PAGE_TIMEOUT_MS = 60000;
export const DEFAULT_DELAY_BEFORE_RETURN_HTML_MS = 100;
export const DEFAULT_CACHE_TTL_MS = 15 * 60 * 1000;
export const DEFAULT_WORD_COUNT_THRESHOLD = 1;
export const SHORT_DELAY_MS = 100;
export const EVALUATION_TIMEOUT_MS = 1000;

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36";

export const COMMON_HEADERS: Record<string, string> = {
  "User-Agent": DEFAULT_USER_AGENT,
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.9",
  "Accept-Encoding": "gzip, deflate, br",
  "Upgrade-Insecure-Requests": "1",
  "Sec-Ch-Ua": '"Not A(Brand";v="99", "Google Chrome";v="121", "Chromium";v="121"',
  "Sec-Ch-Ua-Mobile": "?0",
  "Sec-Ch-Ua-Platform": '"Windows"',
  "Sec-Fetch-Dest": "document",
  "Sec-Fetch-Mode": "navigate",
  "Sec-Fetch-Site": "none",
  "Sec-Fetch-User": "?1",
};

export const MAX_REDIRECTS = 5;

export const OLLAMA_DEFAULT_BASE_URL = "http://localhost:11434/v1";
export const OPENAI_DEFAULT_BASE_URL = "https://api.openai.com/v1";

// Tags dropped from every cleaned document
export const DEFAULT_EXCLUDED_TAGS: ReadonlyArray<string> = ["script", "style", "noscript", "template", "iframe"];

// Regex
export const REGEX_TITLE_TAG = /<title[^>]*>([^<]+)<\/title>/i;
export const REGEX_CHALLENGE_PAGE_KEYWORDS =
  /cloudflare|checking your browser|please wait|verification|captcha|attention required/i;

export const HUMAN_SIMULATION_MIN_DELAY_MS = 150;
export const HUMAN_SIMULATION_RANDOM_MOUSE_DELAY_MS = 200;
export const HUMAN_SIMULATION_SCROLL_DELAY_MS = 200;
export const HUMAN_SIMULATION_RANDOM_SCROLL_DELAY_MS = 300;
