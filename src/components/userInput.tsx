import React from "react";
import { Box, Newline, Text } from "ink";

type UserInputProps = {
	value: string;
	cursor: number;
	disabled?: boolean;
	placeholder?: string;
	debug?: boolean;
	lastKey?: string;
	lastAction?: string;
};

export const UserInput = ({
	value,
	cursor,
	disabled = false,
	placeholder = "Ask for a change, Enter to send",
	debug = false,
	lastKey = "",
	lastAction = "",
}: UserInputProps) => {
	const left = value.slice(0, cursor);
	const right = value.slice(cursor);
	const promptColor = disabled ? "gray" : "magenta";

	return (
		<Box flexDirection="column" flexShrink={0} marginTop={1}>
			<Text>
				<Text color={promptColor}>{">"}</Text>{" "}
				{value.length === 0 ? (
					<>
						<Text color={promptColor}>|</Text>
						<Text color="gray">{disabled ? "working… (Esc to interrupt)" : placeholder}</Text>
					</>
				) : (
					<>
						{left}
						<Text color={promptColor}>|</Text>
						{right}
					</>
				)}
			</Text>

			{debug && (
				<>
					<Newline />
					<Text color="gray">[debug] key: {lastKey}</Text>
					<Text color="gray">[debug] action: {lastAction}</Text>
					<Text color="gray">
						[debug] cursor: {cursor}/{value.length}
					</Text>
				</>
			)}
		</Box>
	);
};
