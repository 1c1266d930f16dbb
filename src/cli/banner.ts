const BANNER = `
  ┏━┓┏┓╻┏━┓╻┏━┓
  ┃ ┃┃┗┫┣━┫┃┣┳┛
  ┗━┛╹ ╹╹ ╹╹╹┗╸
`;

const TAGLINES = [
  "Always live, never scripted.",
  "Talks when you're here, talks when you're not.",
  "One host, no off switch.",
  "The mic is always warm.",
  "Chat fast, think faster.",
];

export function printBanner(version: string): void {
  const tagline = TAGLINES[Math.floor(Math.random() * TAGLINES.length)];
  console.log(BANNER);
  console.log(`  v${version} · ${tagline}\n`);
}
