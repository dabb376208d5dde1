import { type Translations } from "./en.js";

export const ko: Translations = {
  // shell.ts — printWelcome / lifecycle
  welcome_subtitle: " — 자연어 명령을 지원하는 셸",
  welcome_hint:     "'help'로 명령어 목록, 'ai <문장>'으로 원하는 작업 설명, 'exit'로 종료.",
  shell_bye:        "Bye.",
  shell_interrupted: "(중단됨)",
  shell_translated:  "ai> ",
  fatal_startup:     "시작 실패:",
  // dispatcher — errors
  err_command_not_found: "{verb}: 명령어를 찾을 수 없습니다",
  err_usage:             "사용법: {usage}",
  err_NotFound:          "파일이나 디렉토리가 없습니다",
  err_PermissionDenied:  "권한이 없습니다",
  err_AlreadyExists:     "이미 존재합니다",
  err_NotEmpty:          "디렉토리가 비어 있지 않습니다",
  err_IsDirectory:       "디렉토리입니다",
  err_NotDirectory:      "디렉토리가 아닙니다",
  err_Unsupported:       "이 플랫폼에서는 지원되지 않습니다",
  err_Failed:            "작업 실패",
  err_Interrupted:       "중단됨",
  err_cd_dash:           "cd: cd - 는 지원되지 않습니다",
  err_invalid_count:     "{verb}: 잘못된 줄 수: {value}",
  err_history_count:     "history: 잘못된 개수: {value}",
  err_invalid_regex:     "grep: 잘못된 정규식: {pattern}",
  err_help_unknown:      "help: 없는 명령어: {verb}",
  err_invalid_option:    "{verb}: 잘못된 옵션 -- '{option}'",
  // dispatcher — output
  out_goodbye:        "안녕히 가세요!",
  out_history_empty:  "기록된 명령어가 없습니다",
  out_history_clear:  "기록을 지웠습니다",
  out_find_none:      "'{pattern}'와 일치하는 파일이 없습니다",
  out_grep_none:      "'{pattern}'와 일치하는 줄이 없습니다",
  out_cpu:            "CPU 사용률: {percent}",
  out_memory:         "메모리 사용률: {percent}",
  out_disk:           "디스크 사용률 ({path}): {percent}",
  out_used:           "사용:  {value}",
  out_total:          "전체: {value}",
  out_uptime:         "가동 시간: {days}일 {hours}시간 {minutes}분",
  // translator
  ai_unrecognized:  "\"{phrase}\"을(를) 이해하지 못했습니다. 예시는 'ai', 명령어는 'help'.",
  ai_ambiguous:     "\"{phrase}\"의 의미가 분명하지 않습니다. 혹시:",
  ai_ambiguous_end: "이 중 하나를 명령어로 다시 입력하세요.",
  ai_help_header:   "자연어 명령 (ai <문장>):",
  ai_help_usage:    "번역된 명령은 실행 전에 표시되며, 추측한 명령은 실행하지 않습니다.",
  // help
  help_header:        "nlsh — 사용 가능한 명령어",
  help_usage_hint:    "help <명령어>로 개별 사용법을 볼 수 있습니다.",
  help_aliases:       "별칭: {aliases}",
  help_section_file:    "파일 & 디렉토리:",
  help_section_search:  "검색 & 텍스트:",
  help_section_monitor: "시스템 모니터링:",
  help_section_utility: "유틸리티:",
  help_section_ai:      "자연어:",
  help_ls:      "파일과 디렉토리 목록",
  help_cd:      "디렉토리 이동",
  help_pwd:     "현재 디렉토리 표시",
  help_mkdir:   "디렉토리 생성",
  help_rm:      "파일 삭제 (디렉토리는 -r)",
  help_cp:      "파일이나 디렉토리 복사",
  help_mv:      "이동 또는 이름 변경",
  help_cat:     "파일 내용 보기",
  help_touch:   "빈 파일 생성",
  help_write:   "파일에 텍스트 쓰기",
  help_echo:    "텍스트 출력",
  help_find:    "이름으로 파일 찾기",
  help_grep:    "파일에서 텍스트 검색 (-E 정규식, -i 대소문자 무시)",
  help_head:    "파일의 앞부분 보기",
  help_tail:    "파일의 뒷부분 보기",
  help_cpu:     "CPU 사용률",
  help_memory:  "메모리 사용률",
  help_ps:      "실행 중인 프로세스",
  help_uptime:  "시스템 가동 시간",
  help_df:      "디스크 사용량",
  help_du:      "디렉토리 크기",
  help_clear:   "화면 지우기",
  help_history: "명령 기록 (-c 로 삭제)",
  help_whoami:  "현재 사용자",
  help_date:    "날짜와 시간",
  help_help:    "도움말",
  help_exit:    "셸 종료",
  help_ai:      "문장을 명령어로 변환",
};
