import type { ITerminal } from "../ui/Terminal";
import { parseSelection } from "../ui/input";

/**
 * Print a rendered table and ask for a 1-based choice.
 * Returns the chosen item, or null when the user backs out.
 */
export async function chooseFromTable<T>(
	terminal: ITerminal,
	table: readonly string[],
	items: readonly T[],
	noun: string,
): Promise<T | null> {
	for (const line of table) {
		terminal.print(line);
	}

	const answer = await terminal.prompt(
		`Choose a ${noun} to play (1-${items.length}) or 0 to go back: `,
	);
	const index = parseSelection(answer, items.length);
	return index === null ? null : (items[index] ?? null);
}
