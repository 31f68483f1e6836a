import type { Association } from "../types.js";
import { fileArg, literal } from "./template.js";

export const DEFAULT_ASSOCIATIONS: readonly Association[] = [
  { pattern: /\.pdf$/, program: "acroread", args: [fileArg] },
  { pattern: /\.mp3$/, program: "xmms", args: [fileArg] },
  { pattern: /\.(?:mpe?g|avi|wmv)$/, program: "mplayer", args: [literal("-idx"), fileArg] },
  { pattern: /\.(?:jp?g|png)$/, program: "display", args: [fileArg] },
];
