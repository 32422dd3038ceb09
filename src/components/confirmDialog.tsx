import React from "react";
import { Box, Text, useInput } from "ink";

type ConfirmDialogProps = {
	title: string;
	message: string;
	color?: string;
	onConfirm: () => void;
	onCancel: () => void;
};

export const ConfirmDialog: React.FC<ConfirmDialogProps> = ({
	title,
	message,
	color = "yellow",
	onConfirm,
	onCancel,
}) => {
	useInput((input, key) => {
		if (key.escape || input.toLowerCase() === "n") onCancel();
		else if (key.return || input.toLowerCase() === "y") onConfirm();
	});

	return (
		<Box flexDirection="column" borderStyle="round" borderColor={color} paddingX={1}>
			<Text bold color={color}>
				{title}
			</Text>
			<Text>{message}</Text>
			<Text color="gray">y/Enter confirm · n/Esc cancel</Text>
		</Box>
	);
};
