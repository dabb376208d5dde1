export const en = {
  // shell.ts — printWelcome / lifecycle
  welcome_subtitle: " — shell with natural-language commands",
  welcome_hint:     "Type 'help' for commands, 'ai <phrase>' to describe what you want, 'exit' to quit.",
  shell_bye:        "Bye.",
  shell_interrupted: "(interrupted)",
  shell_translated:  "ai> ",
  fatal_startup:     "Failed to start:",
  // dispatcher — errors
  err_command_not_found: "{verb}: command not found",
  err_usage:             "usage: {usage}",
  err_NotFound:          "No such file or directory",
  err_PermissionDenied:  "Permission denied",
  err_AlreadyExists:     "File exists",
  err_NotEmpty:          "Directory not empty",
  err_IsDirectory:       "Is a directory",
  err_NotDirectory:      "Not a directory",
  err_Unsupported:       "Not supported on this platform",
  err_Failed:            "Operation failed",
  err_Interrupted:       "Interrupted",
  err_cd_dash:           "cd: cd - is not supported",
  err_invalid_count:     "{verb}: invalid line count: {value}",
  err_history_count:     "history: invalid count: {value}",
  err_invalid_regex:     "grep: invalid regular expression: {pattern}",
  err_help_unknown:      "help: no such command: {verb}",
  err_invalid_option:    "{verb}: invalid option -- '{option}'",
  // dispatcher — output
  out_goodbye:        "Goodbye!",
  out_history_empty:  "No commands in history",
  out_history_clear:  "History cleared",
  out_find_none:      "No files found matching '{pattern}'",
  out_grep_none:      "No matches found for '{pattern}'",
  out_cpu:            "CPU usage: {percent}",
  out_memory:         "Memory usage: {percent}",
  out_disk:           "Disk usage ({path}): {percent}",
  out_used:           "Used:  {value}",
  out_total:          "Total: {value}",
  out_uptime:         "Uptime: {days} days, {hours} hours, {minutes} minutes",
  // translator
  ai_unrecognized:  "Could not understand \"{phrase}\". Type 'ai' for examples or 'help' for commands.",
  ai_ambiguous:     "Not sure what \"{phrase}\" means. Did you mean:",
  ai_ambiguous_end: "Re-enter one of these as a command.",
  ai_help_header:   "Natural-language commands (ai <phrase>):",
  ai_help_usage:    "The translated command is shown before it runs; guesses are never run.",
  // help
  help_header:        "nlsh — available commands",
  help_usage_hint:    "help <command> shows the usage of one command.",
  help_aliases:       "aliases: {aliases}",
  help_section_file:    "Files & directories:",
  help_section_search:  "Search & text:",
  help_section_monitor: "System monitoring:",
  help_section_utility: "Utilities:",
  help_section_ai:      "Natural language:",
  help_ls:      "List files and directories",
  help_cd:      "Change directory",
  help_pwd:     "Show current directory",
  help_mkdir:   "Create directories",
  help_rm:      "Remove files (-r for directories)",
  help_cp:      "Copy a file or directory",
  help_mv:      "Move or rename",
  help_cat:     "Show file contents",
  help_touch:   "Create empty files",
  help_write:   "Write text to a file",
  help_echo:    "Print text",
  help_find:    "Find files by name",
  help_grep:    "Search text in a file (-E regex, -i ignore case)",
  help_head:    "Show the first lines of a file",
  help_tail:    "Show the last lines of a file",
  help_cpu:     "Show CPU usage",
  help_memory:  "Show memory usage",
  help_ps:      "Show running processes",
  help_uptime:  "Show system uptime",
  help_df:      "Show disk usage",
  help_du:      "Show directory size",
  help_clear:   "Clear the screen",
  help_history: "Show history (-c clears)",
  help_whoami:  "Show current user",
  help_date:    "Show date and time",
  help_help:    "Show this help",
  help_exit:    "Exit the shell",
  help_ai:      "Translate a phrase into a command",
} as const;

export type Translations = { [K in keyof typeof en]: string };
