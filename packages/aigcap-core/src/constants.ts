/**
 * AIGCAP v1 Constants
 *
 * Literal tokens of the header grammar. Parser, serializer and validator all
 * read from here so the three never disagree on spelling.
 */

/** Banner line every header starts with (between two rule lines) */
export const BANNER = 'THIS FILE INCLUDES AI GENERATED CODE';

/** Rule line emitted around the banner and at the end of the header */
export const RULE = '='.repeat(40);

/** A rule line as accepted by the parser (8+ `=`) */
export const RULE_LINE_REGEX = /^={8,}$/;

/** Coverage categories, in serialization order */
export const COVERAGE_TYPES = ['WHOLE', 'ABOVE_HALF', 'BELOW_HALF'] as const;

/** Text written after `TYPE:` for each coverage category */
export const COVERAGE_TYPE_LABELS = {
  WHOLE: 'WHOLE CODE IN THIS FILE',
  ABOVE_HALF: 'ABOVE 50% IN THIS FILE',
  BELOW_HALF: 'DOWN 50% IN THIS FILE',
} as const;

/** Accepted spellings of each `TYPE:` value */
export const COVERAGE_TYPE_PATTERNS = {
  WHOLE: /^WHOLE\s+CODE\s+IN\s+THIS\s+FILE$/i,
  ABOVE_HALF: /^ABOVE\s+50\s*%?\s+IN\s+THIS\s+FILE$/i,
  BELOW_HALF: /^(?:DOWN|BELOW)\s+50\s*%?\s+IN\s+THIS\s+FILE$/i,
} as const;

export const TYPE_FIELD = 'TYPE';
export const REVIEW_FIELD = 'REVIEWED-BY-HUMAN';

/** Upper-case only: `# type: ignore` and friends are not header lines */
export const TYPE_LINE_REGEX = /^TYPE\s*:\s*(.*)$/;
export const REVIEW_LINE_REGEX = /^REVIEWED[-\s]BY[-\s]HUMAN\s*:\s*(.*)$/i;

/** Detail sections, in the fixed order they are serialized */
export const SECTION_ORDER = ['methods', 'structs', 'traits', 'libraries'] as const;

export const SECTION_TITLES = {
  methods: 'METHOD(FUNCTIONS):',
  structs: 'STRUCTS(OBJECTS):',
  traits: 'TRAIT(INTERFACE):',
  libraries: 'IMPORTED LIBRARY:',
} as const;

export const SECTION_TITLE_PATTERNS = {
  methods: /^(?:METHODS?|FUNCTIONS?)(?:\s*\([^)]*\))?\s*:$/i,
  structs: /^(?:STRUCTS?|OBJECTS?)(?:\s*\([^)]*\))?\s*:$/i,
  traits: /^(?:TRAITS?|INTERFACES?)(?:\s*\([^)]*\))?\s*:$/i,
  libraries: /^(?:IMPORTED\s+)?LIBRAR(?:Y|IES)\s*:$/i,
} as const;

/** Symbol kind written inside entries of each symbol section */
export const SYMBOL_KINDS = {
  methods: 'METHOD',
  structs: 'STRUCT',
  traits: 'TRAIT',
} as const;

/** Kind words accepted when parsing entries of each symbol section */
export const SYMBOL_KIND_ALIASES = {
  methods: ['METHOD', 'FUNCTION'],
  structs: ['STRUCT', 'OBJECT'],
  traits: ['TRAIT', 'INTERFACE'],
} as const;

/** Bullet that starts every entry line */
export const ENTRY_BULLET = '- ';

/** Regex to detect an entry line and capture its text */
export const ENTRY_LINE_REGEX = /^[-*]\s*(.*)$/;

/** `<name>: <reason>` (the name may itself contain colons, e.g. `std::fs`) */
export const LIBRARY_ENTRY_REGEX = /^(\S+?):\s+(.+)$/;

/** Symbol names may be quoted or backticked in hand-written headers */
export const QUOTED_NAME_REGEX = /^([`'"])(.+)\1$/;

/** Preamble lines that must stay ahead of the header */
export const PREAMBLE_LINE_PATTERNS = [
  /^#!/,
  /^<\?xml\b[^>]*\?>\s*$/,
  /^<\?php\s*$/,
] as const;

export const BYTE_ORDER_MARK = '\uFEFF';

/** Default location of the protocol document the hook points agents at */
export const DEFAULT_PROTOCOL_PATH = '~/.claude/protocols/AIGCAP_PROTOCOL.md';
