const SAFE = /^[\w@%+=:,./-]+$/

/** Quote one argument for a POSIX shell */
export function shellQuote(arg: string): string {
  if (arg !== '' && SAFE.test(arg)) return arg
  return `'${arg.replace(/'/g, `'"'"'`)}'`
}

export function shellJoin(args: readonly string[]): string {
  return args.map(shellQuote).join(' ')
}
