import figlet from "figlet";
import type { Logger } from "./logger.js";

/**
 * Generate ASCII art text with figlet's Standard font
 * @param msg - Message to convert to ASCII art
 */
export const getAsciiArt = (msg: string, logger?: Logger): string => {
  try {
    return figlet.textSync(msg, {
      font: "Standard",
      horizontalLayout: "default",
      verticalLayout: "default",
      width: 80,
      whitespaceBreak: true,
    });
  } catch {
    logger?.warn("Warning: Font rendering failed, using plain text");
    return msg;
  }
};
