/**
 * @fileoverview Access denial and bot blocking detection.
 * Checks a page's title and visible text for patterns that indicate a bot
 * wall or an access-denied page instead of the real content. Such pages
 * are reported as failed fetches so they never count as "zero detections".
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Result of an access denial check.
 */
export interface AccessDenialResult {
  denied: boolean
  reason: string | null
}

// ============================================================================
// Detection Patterns
// ============================================================================

/** Page title patterns that indicate blocking */
const BLOCKED_TITLE_PATTERNS = [
  'access denied',
  'forbidden',
  '403',
  '401',
  'blocked',
  'not allowed',
  'security check',
  'captcha',
  'bot detection',
  'please verify',
  'are you human',
  'just a moment',
  'checking your browser',
  'ddos protection',
  'attention required',
]

/** Page body text patterns that indicate blocking */
const BLOCKED_BODY_PATTERNS = [
  'access denied',
  'access to this page has been denied',
  'you have been blocked',
  'this request was blocked',
  'automated access',
  'bot traffic',
  'enable javascript and cookies',
  'please complete the security check',
  'checking if the site connection is secure',
  'verify you are human',
  'we have detected unusual activity',
  'your ip has been blocked',
  'rate limit exceeded',
]

/** Only the top of the page is inspected; long pages quoting these phrases are real content */
const BODY_SCAN_LIMIT = 2000

// ============================================================================
// Detection Functions
// ============================================================================

/**
 * Decide whether a page is a block page rather than the requested content.
 *
 * @param title - Document title as rendered
 * @param bodyText - Visible body text (any case)
 *
 * @example
 * detectAccessDenial('Just a moment...', '') // { denied: true, reason: 'Page title indicates blocking: "Just a moment..."' }
 */
export function detectAccessDenial(title: string, bodyText: string): AccessDenialResult {
  const titleLower = title.toLowerCase()

  for (const pattern of BLOCKED_TITLE_PATTERNS) {
    if (titleLower.includes(pattern)) {
      return { denied: true, reason: `Page title indicates blocking: "${title}"` }
    }
  }

  const head = bodyText.substring(0, BODY_SCAN_LIMIT).toLowerCase()
  for (const pattern of BLOCKED_BODY_PATTERNS) {
    if (head.includes(pattern)) {
      return { denied: true, reason: `Page content indicates blocking: "${pattern}"` }
    }
  }

  return { denied: false, reason: null }
}
