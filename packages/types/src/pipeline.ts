export interface ParseResult {
  text: string;
}
