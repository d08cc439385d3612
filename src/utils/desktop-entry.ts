export interface DesktopEntry {
  name: string;
  comment: string;
  exec: string;
  icon: string;
  categories: string[];
  terminal: boolean;
}

/**
 * Renders a freedesktop.org `.desktop` file for an application
 */
export function renderDesktopEntry(entry: DesktopEntry): string {
  return [
    "[Desktop Entry]",
    "Type=Application",
    `Name=${entry.name}`,
    `Comment=${entry.comment}`,
    `Exec=${entry.exec}`,
    `Icon=${entry.icon}`,
    `Categories=${entry.categories.map((c) => `${c};`).join("")}`,
    `Terminal=${entry.terminal}`,
    "",
  ].join("\n");
}

/**
 * Reads the `[Desktop Entry]` group of a `.desktop` file into key/value pairs
 */
export function parseDesktopEntry(content: string): Record<string, string> {
  const fields: Record<string, string> = {};
  let inEntry = false;

  for (const raw of content.split("\n")) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) {
      continue;
    }
    if (line.startsWith("[")) {
      inEntry = line === "[Desktop Entry]";
      continue;
    }
    const eq = line.indexOf("=");
    if (inEntry && eq > 0) {
      fields[line.slice(0, eq)] = line.slice(eq + 1);
    }
  }

  return fields;
}
