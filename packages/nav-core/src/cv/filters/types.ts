export interface ScalarFilter {
  update(value: number): number;
  current(): number | undefined;
  reset(): void;
}
