import type { Key } from "ink";

export type EditorState = {
	value: string;
	cursor: number;
	history: string[];
	historyIndex: number | null;
	draft: string;
};

export type EditResult = { state: EditorState; action: string };

export const EMPTY_EDITOR: EditorState = {
	value: "",
	cursor: 0,
	history: [],
	historyIndex: null,
	draft: "",
};

// Multi-line paste is allowed; other C0 controls and DEL are not.
function isPrintable(s: string): boolean {
	return s.length > 0 && /[\u0020-\u007E\u00A0-\uFFFF\n\r\t]/.test(s);
}

export function prevWordIndex(s: string, from: number): number {
	let i = Math.max(0, from - 1);
	while (i > 0 && /\s/.test(s[i] ?? "")) i--;
	while (i > 0 && !/\s/.test(s[i - 1] ?? "")) i--;
	return i;
}

export function nextWordIndex(s: string, from: number): number {
	let i = Math.min(s.length, from);
	while (i < s.length && /\s/.test(s[i] ?? "")) i++;
	while (i < s.length && !/\s/.test(s[i] ?? "")) i++;
	return i;
}

function withValue(state: EditorState, value: string, cursor = value.length): EditorState {
	return { ...state, value, cursor: Math.max(0, Math.min(value.length, cursor)) };
}

/** Records a submitted line and resets the composer. */
export function commitLine(state: EditorState): EditorState {
	const line = state.value;
	return {
		...EMPTY_EDITOR,
		history: line.trim().length > 0 ? [...state.history, line] : state.history,
	};
}

/**
 * Applies one key press to the composer. Returns null for keys the editor
 * does not own (plain Enter, Escape, application shortcuts).
 */
export function editLine(state: EditorState, input: string, key: Key): EditResult | null {
	const { value, cursor, history, historyIndex } = state;

	if (key.return) {
		if (!key.shift) return null;
		return {
			state: withValue(state, value.slice(0, cursor) + "\n" + value.slice(cursor), cursor + 1),
			action: "newline",
		};
	}

	if (key.upArrow) {
		if (history.length === 0) return null;
		const idx = historyIndex === null ? history.length - 1 : Math.max(0, historyIndex - 1);
		const draft = historyIndex === null ? value : state.draft;
		return {
			state: { ...withValue(state, history[idx] ?? ""), historyIndex: idx, draft },
			action: "history: up",
		};
	}
	if (key.downArrow) {
		if (historyIndex === null) return null;
		if (historyIndex < history.length - 1) {
			const idx = historyIndex + 1;
			return {
				state: { ...withValue(state, history[idx] ?? ""), historyIndex: idx },
				action: "history: down",
			};
		}
		return {
			state: { ...withValue(state, state.draft), historyIndex: null, draft: "" },
			action: "history: draft",
		};
	}

	if (key.leftArrow) {
		const next = key.meta ? prevWordIndex(value, cursor) : cursor - 1;
		return { state: withValue(state, value, next), action: "cursor: left" };
	}
	if (key.rightArrow) {
		const next = key.meta ? nextWordIndex(value, cursor) : cursor + 1;
		return { state: withValue(state, value, next), action: "cursor: right" };
	}

	if (key.ctrl && input.toLowerCase() === "e") {
		return { state: withValue(state, value, value.length), action: "cursor: end" };
	}
	if (key.ctrl && input.toLowerCase() === "u") {
		return { state: withValue(state, value.slice(cursor), 0), action: "kill: to-start" };
	}
	if (key.ctrl && input.toLowerCase() === "k") {
		return { state: withValue(state, value.slice(0, cursor), cursor), action: "kill: to-end" };
	}

	// Some terminals report Backspace as Delete with no other flags.
	const deleteMeansBackspace =
		key.delete && !key.ctrl && !key.meta && !key.shift && input.length === 0 && cursor > 0;
	if (key.backspace || deleteMeansBackspace || (key.ctrl && input.toLowerCase() === "h")) {
		if (cursor === 0) return { state, action: "backspace: start" };
		const start = key.meta ? prevWordIndex(value, cursor) : cursor - 1;
		return {
			state: withValue(state, value.slice(0, start) + value.slice(cursor), start),
			action: key.meta ? "backspace: word" : "backspace: char",
		};
	}
	if (key.delete) {
		if (cursor >= value.length) return { state, action: "delete: end" };
		return {
			state: withValue(state, value.slice(0, cursor) + value.slice(cursor + 1), cursor),
			action: "delete: forward",
		};
	}

	if (!key.ctrl && !key.meta && !key.escape && !key.tab && isPrintable(input)) {
		return {
			state: withValue(
				state,
				value.slice(0, cursor) + input + value.slice(cursor),
				cursor + input.length
			),
			action: `insert: ${input.length} char(s)`,
		};
	}
	return null;
}
