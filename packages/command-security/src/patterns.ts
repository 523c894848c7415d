import { SuspiciousPattern } from "./types";

// Terms that mark a command as dangerous when the policy does not override them
export const DEFAULT_DANGEROUS_TERMS: readonly string[] = [
  // Destructive filesystem operations
  "rm -rf",
  "del /f",
  "format",
  "fdisk",
  "mkfs",
  "dd if=",

  // System control
  "shutdown",
  "reboot",
  "halt",
  "poweroff",
  "taskkill /f",

  // Registry, firewall and permissions
  "reg delete",
  "netsh",
  "iptables",
  "chmod 777",
  "chown",

  // Downloaders and nested interpreters
  "wget",
  "curl",
  "powershell",
  "cmd",
  "bash",
  "sh",
];

// Structural markers, matched case-sensitively against the raw command
export const SUSPICIOUS_PATTERNS: readonly SuspiciousPattern[] = [
  { pattern: /[|&;]/, description: "pipe or chain operator" },
  { pattern: />\s*[/\\]/, description: "redirection into a root path" },
  { pattern: /<.*>/, description: "angle-bracket redirection" },
  { pattern: /\$\([^)]*\)/, description: "command substitution" },
  { pattern: /`[^`]*`/, description: "backtick execution" },
];
