/**
 * 언어별 전처리 규칙
 *
 * Closed set of target languages. Each variant carries its own comment
 * delimiters, string-literal shapes and import patterns; extensions and
 * keywords come from languages.json. Rules are resolved once per job with
 * `getLanguageRules` and handed to every `normalize` call.
 */
import languageData from "./languages.json" with { type: "json" };

export const SUPPORTED_LANGUAGES = [
    "python",
    "java",
    "javascript",
    "typescript",
    "csharp",
    "cpp",
    "c",
    "go",
    "rust",
] as const;

export type SupportedLanguage = (typeof SUPPORTED_LANGUAGES)[number];

export interface LanguageRules {
    name: SupportedLanguage;
    extensions: readonly string[];
    keywords: ReadonlySet<string>;
    /**
     * One pass over the text: group 1 = block comment, group 2 = string
     * literal (kept), group 3 = line comment.
     */
    commentPattern: RegExp;
    importPatterns: readonly RegExp[];
    identifierPattern: RegExp;
}

interface LanguageSyntax {
    blockComments: string[];
    strings: string[];
    lineComment: string;
    imports: string[];
    identifier: string;
}

const DOUBLE_QUOTED = String.raw`"(?:\\.|[^"\\\n])*"`;
const SINGLE_QUOTED = String.raw`'(?:\\.|[^'\\\n])*'`;
const CHAR_LITERAL = String.raw`'(?:\\.|[^'\\\n])'`;
const BACKTICK = String.raw`\x60(?:\\.|[^\x60\\])*\x60`;
const C_BLOCK = String.raw`\/\*[\s\S]*?\*\/`;
const C_LINE = String.raw`\/\/[^\n]*`;
const WORD_IDENTIFIER = String.raw`(?<![\w])[A-Za-z_]\w*`;
const JS_IDENTIFIER = String.raw`(?<![\w$])[A-Za-z_$][\w$]*`;

const JS_IMPORTS = [
    String.raw`^[ \t]*import[ \t]+(?:type[ \t]+)?[^;'"]*?from[ \t]*(['"])[^'"\n]*\1[ \t]*;?`,
    String.raw`^[ \t]*import[ \t]*(['"])[^'"\n]*\1[ \t]*;?`,
    String.raw`^[ \t]*(?:const|let|var)[ \t]+[^=\n]+=[ \t]*require\([^)\n]*\)[ \t]*;?`,
];

const C_INCLUDE = String.raw`^[ \t]*#[ \t]*include[ \t]*[<"][^>"\n]*[>"]`;

const SYNTAX: Record<SupportedLanguage, LanguageSyntax> = {
    python: {
        blockComments: [String.raw`"""[\s\S]*?"""`, String.raw`'''[\s\S]*?'''`],
        strings: [DOUBLE_QUOTED, SINGLE_QUOTED],
        lineComment: String.raw`#[^\n]*`,
        imports: [
            String.raw`^[ \t]*import[ \t]+[^\n]*`,
            String.raw`^[ \t]*from[ \t]+\S+[ \t]+import[ \t]+(?:\([^)]*\)|[^\n]*)`,
        ],
        identifier: WORD_IDENTIFIER,
    },
    java: {
        blockComments: [C_BLOCK],
        strings: [DOUBLE_QUOTED, CHAR_LITERAL],
        lineComment: C_LINE,
        imports: [String.raw`^[ \t]*import[ \t]+(?:static[ \t]+)?[\w.*]+[ \t]*;`],
        identifier: WORD_IDENTIFIER,
    },
    javascript: {
        blockComments: [C_BLOCK],
        strings: [DOUBLE_QUOTED, SINGLE_QUOTED, BACKTICK],
        lineComment: C_LINE,
        imports: JS_IMPORTS,
        identifier: JS_IDENTIFIER,
    },
    typescript: {
        blockComments: [C_BLOCK],
        strings: [DOUBLE_QUOTED, SINGLE_QUOTED, BACKTICK],
        lineComment: C_LINE,
        imports: JS_IMPORTS,
        identifier: JS_IDENTIFIER,
    },
    csharp: {
        blockComments: [C_BLOCK],
        strings: [DOUBLE_QUOTED, CHAR_LITERAL],
        lineComment: C_LINE,
        imports: [String.raw`^[ \t]*using[ \t]+(?:static[ \t]+)?[\w.]+(?:[ \t]*=[ \t]*[\w.<>]+)?[ \t]*;`],
        identifier: WORD_IDENTIFIER,
    },
    cpp: {
        blockComments: [C_BLOCK],
        strings: [DOUBLE_QUOTED, CHAR_LITERAL],
        lineComment: C_LINE,
        imports: [C_INCLUDE, String.raw`^[ \t]*using[ \t]+namespace[ \t]+[\w:]+[ \t]*;`],
        identifier: WORD_IDENTIFIER,
    },
    c: {
        blockComments: [C_BLOCK],
        strings: [DOUBLE_QUOTED, CHAR_LITERAL],
        lineComment: C_LINE,
        imports: [C_INCLUDE],
        identifier: WORD_IDENTIFIER,
    },
    go: {
        blockComments: [C_BLOCK],
        strings: [DOUBLE_QUOTED, CHAR_LITERAL, BACKTICK],
        lineComment: C_LINE,
        imports: [
            String.raw`^[ \t]*import[ \t]*\([^)]*\)`,
            String.raw`^[ \t]*import[ \t]+(?:[\w.]+[ \t]+)?"[^"\n]*"`,
        ],
        identifier: WORD_IDENTIFIER,
    },
    rust: {
        blockComments: [C_BLOCK],
        // single-char literal only, so lifetimes ('a) are not read as strings
        strings: [DOUBLE_QUOTED, CHAR_LITERAL],
        lineComment: C_LINE,
        imports: [
            String.raw`^[ \t]*(?:pub(?:\([^)]*\))?[ \t]+)?use[ \t]+[^;]+;`,
            String.raw`^[ \t]*extern[ \t]+crate[ \t]+\w+[ \t]*;`,
        ],
        identifier: WORD_IDENTIFIER,
    },
};

const rulesCache = new Map<SupportedLanguage, LanguageRules>();

export function isSupportedLanguage(value: string): value is SupportedLanguage {
    return (SUPPORTED_LANGUAGES as readonly string[]).includes(value);
}

function buildRules(language: SupportedLanguage): LanguageRules {
    const syntax = SYNTAX[language];
    const data = languageData[language];

    const commentPattern = new RegExp(
        `(${syntax.blockComments.join("|")})|(${syntax.strings.join("|")})|(${syntax.lineComment})`,
        "g"
    );

    return {
        name: language,
        extensions: data.extensions,
        keywords: new Set(data.keywords),
        commentPattern,
        importPatterns: syntax.imports.map((source) => new RegExp(source, "gm")),
        identifierPattern: new RegExp(syntax.identifier, "g"),
    };
}

/**
 * Resolves the rules for a language. Cached; the returned object is shared.
 */
export function getLanguageRules(language: SupportedLanguage): LanguageRules {
    let rules = rulesCache.get(language);
    if (!rules) {
        rules = buildRules(language);
        rulesCache.set(language, rules);
    }
    return rules;
}

export function matchesLanguage(path: string, rules: LanguageRules): boolean {
    const lower = path.toLowerCase();
    return rules.extensions.some((ext) => lower.endsWith(ext));
}
