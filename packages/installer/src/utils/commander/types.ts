export type Block = {
  label: string;
  lines: string[];
};
