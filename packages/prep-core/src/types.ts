export type Token = string;
export type Rank = number;
export type SplitName = 'train' | 'valid' | 'test';

export interface TokenStat { count: number; firstIndex: number; }
export type RankTable = Map<Token, Rank>;

export interface CipherRecord { ciphertext: string; plaintext: string; }

export type SkipReason = 'malformed-json' | 'invalid-record';
export interface SkippedRecord { file: string; split: SplitName; reason: SkipReason; message: string; }

export interface SplitStats { files: number; records: number; skipped: number; src: string; tgt: string; }
export interface PrepareResult {
  mode: 'pairs' | 'split';
  splits: Partial<Record<SplitName, SplitStats>>;
  skipped: SkippedRecord[];
}
