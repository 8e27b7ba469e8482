const BANNER = `
  ┏┓┓┏┳┓┏┓┏┓┳┓┏┓┏┳┓
  ┃┃┃┃┃┃┃┓┣ ┣┫┃┃ ┃
  ┛┗┗┛┻┛┗┛┗┛┻┛┗┛ ┻
`;

const TAGLINES = [
  "A gentle follow-up, never spam.",
  "Quiet hours respected.",
  "One nudge at a time.",
  "Remembers so you don't have to.",
];

export function printBanner(version: string): void {
  const tagline = TAGLINES[Math.floor(Math.random() * TAGLINES.length)];
  console.log(BANNER);
  console.log(`  v${version} - ${tagline}\n`);
}
