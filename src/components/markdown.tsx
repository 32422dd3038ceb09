import React from "react";
import { Box, Text } from "ink";
import { marked, type Token, type Tokens } from "marked";
import { DiffLines } from "./diffView";

type MarkdownProps = {
	content: string;
	color?: string;
};

const lexerOptions = { gfm: true, breaks: true };

export const Markdown: React.FC<MarkdownProps> = ({ content, color }) => {
	const tokens = React.useMemo(() => marked.lexer(content, lexerOptions), [content]);

	if (!tokens.length) {
		return null;
	}

	return (
		<Box flexDirection="column" gap={0}>
			{tokens.map((token, index) => renderBlockToken(token, color, `block-${index}`))}
		</Box>
	);
};

const HEADING_COLORS = ["cyan", "green", "magenta", "yellow"] as const;

function childTokens(token: Token): Token[] {
	return "tokens" in token && Array.isArray(token.tokens) ? token.tokens : [];
}

function renderBlockToken(
	token: Token,
	color: string | undefined,
	key: string
): React.ReactNode {
	switch (token.type) {
		case "space":
			return <Text key={key}> </Text>;
		case "paragraph":
			return (
				<Text key={key} color={color}>
					{renderInlineTokens(childTokens(token), key, color)}
				</Text>
			);
		case "heading": {
			const depth = typeof token.depth === "number" ? token.depth : 1;
			const headingColor = HEADING_COLORS[Math.min(depth - 1, HEADING_COLORS.length - 1)];
			return (
				<Text key={key} color={headingColor} bold>
					{renderInlineTokens(childTokens(token), key, color)}
				</Text>
			);
		}
		case "code": {
			const lang = typeof token.lang === "string" ? token.lang : "";
			const text = typeof token.text === "string" ? token.text : token.raw;
			return (
				<Box
					key={key}
					flexDirection="column"
					paddingX={1}
					borderStyle="round"
					borderColor="gray"
				>
					{lang && (
						<Text color="gray" dimColor>
							{lang}
						</Text>
					)}
					{lang === "diff" ? <DiffLines diff={text} /> : <Text color="magenta">{text}</Text>}
				</Box>
			);
		}
		case "blockquote":
			return (
				<Box key={key} flexDirection="row">
					<Text color="gray">{"> "}</Text>
					<Box flexDirection="column">
						{childTokens(token).map((child, idx) =>
							renderBlockToken(child, color, `${key}-child-${idx}`)
						)}
					</Box>
				</Box>
			);
		case "list":
			return renderList(token, color, key);
		case "hr":
			return (
				<Text key={key} color="gray">
					────────────────────────
				</Text>
			);
		case "text": {
			const inner = childTokens(token);
			return (
				<Text key={key} color={color}>
					{inner.length > 0 ? renderInlineTokens(inner, key, color) : token.raw}
				</Text>
			);
		}
		default:
			return (
				<Text key={key} color={color}>
					{token.raw}
				</Text>
			);
	}
}

function isListItem(value: unknown): value is Tokens.ListItem {
	return typeof value === "object" && value !== null && "type" in value && value.type === "list_item";
}

function renderList(token: Token, color: string | undefined, key: string): React.ReactNode {
	const items = "items" in token && Array.isArray(token.items) ? token.items.filter(isListItem) : [];
	const ordered = "ordered" in token && token.ordered === true;
	const start = "start" in token && typeof token.start === "number" ? token.start : 1;
	return (
		<Box key={key} flexDirection="column">
			{items.map((item, idx) => {
				const marker = item.task
					? `[${item.checked ? "x" : " "}]`
					: ordered
						? `${start + idx}.`
						: "•";
				const itemKey = `${key}-item-${idx}`;
				return (
					<Box key={itemKey} flexDirection="row">
						<Text color={color}>{marker}</Text>
						<Box flexDirection="column" marginLeft={1}>
							{item.tokens.map((child, childIdx) => {
								const childKey = `${itemKey}-content-${childIdx}`;
								if (!item.loose && child.type === "text") {
									const inner = childTokens(child);
									return (
										<Text key={childKey} color={color}>
											{inner.length > 0 ? renderInlineTokens(inner, childKey, color) : child.raw}
										</Text>
									);
								}
								return renderBlockToken(child, color, childKey);
							})}
						</Box>
					</Box>
				);
			})}
		</Box>
	);
}

function tokenText(token: Token): string {
	return "text" in token && typeof token.text === "string" ? token.text : token.raw;
}

function renderInlineTokens(
	tokens: Token[],
	keyPrefix: string,
	color: string | undefined
): React.ReactNode[] {
	return tokens.map((token, index) => {
		const key = `${keyPrefix}-inline-${index}`;
		const inner = childTokens(token);
		switch (token.type) {
			case "text":
				return inner.length > 0 ? (
					<React.Fragment key={key}>{renderInlineTokens(inner, key, color)}</React.Fragment>
				) : (
					<React.Fragment key={key}>{tokenText(token)}</React.Fragment>
				);
			case "strong":
				return (
					<Text key={key} bold>
						{renderInlineTokens(inner, key, color)}
					</Text>
				);
			case "em":
				return (
					<Text key={key} italic>
						{renderInlineTokens(inner, key, color)}
					</Text>
				);
			case "codespan":
				return (
					<Text key={key} color="yellow">
						{tokenText(token)}
					</Text>
				);
			case "br":
				return <Text key={key}>{"\n"}</Text>;
			case "del":
				return (
					<Text key={key} strikethrough>
						{renderInlineTokens(inner, key, color)}
					</Text>
				);
			case "link": {
				const href = "href" in token && typeof token.href === "string" ? token.href : "";
				return (
					<Text key={key} underline color="cyan">
						{renderInlineTokens(inner, key, color)}
						{href ? ` (${href})` : ""}
					</Text>
				);
			}
			case "escape":
				return <React.Fragment key={key}>{tokenText(token)}</React.Fragment>;
			default:
				return <React.Fragment key={key}>{token.raw}</React.Fragment>;
		}
	});
}
