import type { StyleFormat } from "../style/index.js";

export interface StyleEntry {
  geolevel: string;
  subject: string;
  path: string;
  format: StyleFormat;
}
