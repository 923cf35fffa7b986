export interface Summarizer {
  readonly name: string;
  summarize(sectionText: string): string;
}
