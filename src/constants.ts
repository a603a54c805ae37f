export const DEFAULT_USER_AGENT =
  "civicrawl/0.1 (+set CRAWLER_USER_AGENT with contact info)";

export const DEFAULT_CONFIG_PATH = "config/params.yaml";
export const INDEX_FILE_NAME = "_index.json";
export const AUTO_STATE_FILE_NAME = "_auto_state.json";
export const UNIFIED_OUTPUT_FILE_NAME = "documents.jsonl";

export const SCHEDULING_GROUPS = ["gdelt", "youtube", "forums"] as const;

export const SOURCE_STAT_KEYS = [
  "discovered",
  "attempted",
  "skipped_indexed",
  "fetched",
  "retried_ok",
  "fetch_failed_transient",
  "fetch_failed_permanent",
  "extract_failed",
  "quality_rejected",
  "duplicates",
  "rejected",
  "stored",
] as const;

/** search.list (100) + videos.list (1) */
export const VIDEO_PICK_COST_UNITS = 101;
export const VIDEO_SEARCH_COST_UNITS = 100;
export const VIDEO_DETAILS_COST_UNITS = 1;
export const VIDEO_COMMENTS_PAGE_COST_UNITS = 1;
export const DEFAULT_COMMENTS_PAGES = 5;
export const AUTOCRAWL_COMMENTS_PAGES = 0;

export const MAX_NEWS_WINDOW_DAYS = 30;
export const DEFAULT_NEWS_OVERLAP_DAYS = 2;
export const MIN_NEWS_KEYWORD_LENGTH = 3;

export const SHORT_TEXT_KEY_THRESHOLD = 80;

export const GDELT_API_URL = "https://api.gdeltproject.org/api/v2/doc/doc";
export const YOUTUBE_API_BASE = "https://www.googleapis.com/youtube/v3";
export const YOUTUBE_TIMEDTEXT_URL = "https://www.youtube.com/api/timedtext";

export const TRACKING_QUERY_PARAMS = new Set([
  "utm_source",
  "utm_medium",
  "utm_campaign",
  "utm_term",
  "utm_content",
  "fbclid",
  "gclid",
  "igshid",
  "mibextid",
  "ref",
  "ref_src",
  "spm",
]);

export const BLOCKED_EXTENSIONS_REGEX =
  /\.(png|jpe?g|gif|svg|webp|ico|pdf|zip|tar|gz|mp4|mp3|woff2?|ttf|eot|css|js)$/i;

export const LINE_SPLIT_REGEX = /\r?\n/;
export const WHITESPACE_RUN_REGEX = /\s+/g;
export const ZERO_WIDTH_REGEX = /[\u200B-\u200D\u2060\uFEFF]/g;

export const CLUTTER_SELECTORS = [
  "nav",
  "header",
  "footer",
  "script",
  "style",
  "iframe",
  "svg",
  "noscript",
  "template",
  "form",
  "button",
  "input",
];

/** Post body containers used when Readability finds nothing on a thread page. */
export const FORUM_BODY_SELECTORS: Record<string, string[]> = {
  dcinside: [".write_div", ".writing_view_box"],
  bobaedream: [".bodyCont", "#body_frame"],
  fmkorea: [".xe_content", "article"],
  mlbpark: ["#contentDetail", ".ar_txt"],
  theqoo: [".rd_body .xe_content", ".rd_body"],
  ppomppu: ["td.board-contents", ".board-contents"],
};

export const FORUM_COMMENT_SELECTORS: Record<string, string[]> = {
  dcinside: [".cmt_list .usertxt", ".comment_box .usertxt"],
  bobaedream: [".commentlistbox .cmt_txt", "dd.co_txt"],
  fmkorea: [".fdb_lst_ul .xe_content"],
  mlbpark: [".reply_list .re_txt", "span.re_txt"],
  theqoo: [".fdb_lst_ul .xe_content", ".comment-content"],
  ppomppu: [".comment_wrapper .comment_line", "div.comment_line"],
};

export const FORUM_PAGE_PARAM: Record<string, string> = {
  dcinside: "page",
  bobaedream: "page",
  fmkorea: "page",
  mlbpark: "p",
  theqoo: "page",
  ppomppu: "page",
};

/** Query parameters that identify a thread on a known view URL; everything else is dropped. */
export const IDENTIFYING_QUERY_PARAMS: Array<{
  host: string;
  pathIncludes: string[];
  keep: string[];
}> = [
  { host: "dcinside.com", pathIncludes: ["/board/view"], keep: ["id", "no"] },
  {
    host: "bobaedream.co.kr",
    pathIncludes: ["/board/bbs_view", "/view"],
    keep: ["code", "no"],
  },
  { host: "mlbpark.donga.com", pathIncludes: ["/mp/b.php"], keep: ["b", "id", "idx"] },
  { host: "ppomppu.co.kr", pathIncludes: ["/zboard/view.php"], keep: ["id", "no"] },
  { host: "news.naver.com", pathIncludes: [""], keep: ["oid", "aid"] },
];

/** ISO 639-3 → ISO 639-1 for the languages this crawler expects to see. */
export const LANGUAGE_CODE_MAP: Record<string, string> = {
  kor: "ko",
  eng: "en",
  jpn: "ja",
  cmn: "zh",
  zho: "zh",
  spa: "es",
  fra: "fr",
  deu: "de",
  rus: "ru",
  vie: "vi",
  tha: "th",
  ind: "id",
  por: "pt",
  ita: "it",
};

export const KST_OFFSET_MINUTES = 9 * 60;
