// Legacy Telegram Markdown only reserves these four
export const escapeMarkdown = (text: string) => text.replace(/([_*`[])/g, '\\$1');

export const capitalize = (text: string) =>
  text ? text.charAt(0).toUpperCase() + text.slice(1).toLowerCase() : text;
