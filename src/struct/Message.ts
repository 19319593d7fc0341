// Cache for regular expressions (avoid creating new RegExp on each call)
const regexCache = new Map<string, RegExp>();

// Get or create cached RegExp for variable
function getRegex(key: string): RegExp {
  let regex = regexCache.get(key);
  if (!regex) {
    regex = new RegExp(`{{${key}}}`, "g");
    regexCache.set(key, regex);
  }
  return regex;
}

// Format message, replacing {{key}} placeholders with values
export function formatMessage(
  message: Msg,
  variables: Record<string, string> = {}
): string {
  let result: string = message;
  for (const [key, value] of Object.entries(variables)) {
    // A function replacement keeps `$` in titles literal
    result = result.replace(getRegex(key), () => value);
  }
  return result;
}

export enum Msg {
  FREEZE = "Please press 'Enter' to continue.",
  HEADER = "Songs: {{path}} ({{sets}} sets, {{charts}} charts)\n",

  COMMANDS = "command:\n- check | exit | find [field=]<keyword> | flush | list | path",
  INPUT_COMMAND = ">",
  INPUT_KEYWORD = "keyword:",
  QUERY_FIELDS_HINT = "fields: sid, bid, name, artist, creator, diff (e.g. 'artist=camellia')",

  LOADING_CACHE = "Loading index cache...",
  SCANNING = "Scanning [ {{current}}/{{total}} ] {{folder}}",
  SCAN_SUMMARY = "Scanned {{total}} folders: {{parsed}} parsed, {{reused}} cached, {{omitted}} without charts, {{skipped}} skipped.",
  SCAN_WARNINGS = "{{count}} files or folders were skipped, see {{path}}.",

  TABLE_HEADER = "sid      | artist                         | title",
  TABLE_ROW = "{{sid}} | {{artist}} | {{title}}",
  TABLE_CHARTS = "         └ {{charts}}",
  TOTAL = "total: {{total}}",

  DUPLICATE_GROUP = "#{{index}} {{reason}} {{key}} ({{count}} folders)",
  DUPLICATE_ENTRY = "  {{path}} [{{charts}} charts]",
  NO_DUPLICATES = "No duplicated beatmapsets found.",

  PATH_CURRENT = "path: {{path}}",
  PATH_INPUT = "switch to (enter `q` to cancel):",
  PATH_INVALID = "invalid path: `{{path}}`",

  COMMAND_ERROR = "[{{type}}] {{message}}",
  PROCESS_ERRORED = "An error occurred: {{error}}",

  // Setup Wizard
  SETUP_WELCOME = "Welcome to osu-songs-search! Let's set up your preferences.\n",
  SETUP_SONGS_PATH = "Enter the path to your osu! Songs folder (e.g., C:\\osu!\\Songs):",
}
