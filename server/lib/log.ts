export function log(message: string, source = "express") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

const LOG_LINE_MAX = 80;

export const formatRequestLine = (
  method: string,
  path: string,
  statusCode: number,
  durationMs: number,
  preview?: string,
): string => {
  let line = `${method} ${path} ${statusCode} in ${durationMs}ms`;
  if (preview) {
    line += ` :: ${preview}`;
  }
  if (line.length > LOG_LINE_MAX) {
    line = line.slice(0, LOG_LINE_MAX - 1) + "…";
  }
  return line;
};
