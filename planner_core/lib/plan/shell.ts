const SAFE_SHELL_ARG = /^[A-Za-z0-9@%+=:,./_-]+$/;

/** Single-quotes an argument unless it is made only of shell-safe characters. */
export function quoteShellArg(value: string): string {
    if (value.length > 0 && SAFE_SHELL_ARG.test(value)) {
        return value;
    }

    return `'${value.replace(/'/g, `'\\''`)}'`;
}
