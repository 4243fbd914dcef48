export type ParsedCommand =
  | { kind: 'collect'; outputPath?: string }
  | { kind: 'audit'; inputPath?: string; reportPath?: string }
  | { kind: 'run'; outputPath?: string; reportPath?: string };
