import React, { useCallback, useEffect, useReducer, useRef, useState } from "react";
import { Box, Text, useInput } from "ink";
import type { MemorySink } from "./logger";
import type { ConfirmationDecision, DecisionRequest } from "./safety/gate";
import type { Session } from "./session";
import { ApprovalDialog } from "./components/approvalDialog";
import { ConfirmDialog } from "./components/confirmDialog";
import { DiffPanel } from "./components/diffView";
import { Header } from "./components/header";
import { commitLine, editLine, EMPTY_EDITOR, type EditorState } from "./components/lineEditor";
import { LogsPanel } from "./components/logsPanel";
import { TimelineView } from "./components/timelineView";
import { UserInput } from "./components/userInput";

type AppProps = {
	session: Session;
	logs: MemorySink;
	debug?: boolean;
	/** Set false in tests that drive ticks by hand. */
	autoStart?: boolean;
};

type PendingApproval = {
	request: DecisionRequest;
	resolve: (decision: ConfirmationDecision) => void;
};

type Dialog = "arm" | "clear" | null;
type Panel = "diff" | "logs" | null;

function useRerender(subscribe: (listener: () => void) => () => void): void {
	const [, force] = useReducer((n: number) => n + 1, 0);
	useEffect(() => subscribe(force), [subscribe]);
}

function describeKey(input: string, flags: Record<string, boolean>): string {
	const active = Object.entries(flags)
		.filter(([, on]) => on)
		.map(([name]) => name)
		.join("+");
	return `${JSON.stringify(input)}${active ? ` [${active}]` : ""}`;
}

export const App: React.FC<AppProps> = ({ session, logs, debug = false, autoStart = true }) => {
	const { gate, renderLoop, runner, registry } = session;
	const [editor, setEditor] = useState<EditorState>(EMPTY_EDITOR);
	const [pending, setPending] = useState<PendingApproval | null>(null);
	const [dialog, setDialog] = useState<Dialog>(null);
	const [panel, setPanel] = useState<Panel>(null);
	const [notice, setNotice] = useState<string | null>(null);
	const [lastKey, setLastKey] = useState("");
	const [lastAction, setLastAction] = useState("");
	const pendingRef = useRef<PendingApproval | null>(null);

	useRerender(useCallback((l: () => void) => renderLoop.subscribe(l), [renderLoop]));
	useRerender(useCallback((l: () => void) => gate.subscribe(l), [gate]));
	useRerender(useCallback((l: () => void) => logs.subscribe(l), [logs]));

	useEffect(() => {
		if (!autoStart) return;
		renderLoop.start();
		return () => renderLoop.stop();
	}, [renderLoop, autoStart]);

	// The approval dialog is the gate's confirmation surface while mounted.
	useEffect(() => {
		let mounted = true;
		gate.attach({
			isAvailable: () => mounted,
			requestDecision: (request) =>
				new Promise<ConfirmationDecision>((resolve) => {
					const entry = { request, resolve };
					pendingRef.current = entry;
					setPending(entry);
				}),
			notifyArmedRequired: (toolName) => {
				setNotice(`${toolName} needs ARMED mode. Press Alt+A to arm the session.`);
			},
		});
		return () => {
			mounted = false;
			gate.attach(null);
			pendingRef.current?.resolve("deny");
			pendingRef.current = null;
		};
	}, [gate]);

	const decide = useCallback((decision: ConfirmationDecision) => {
		const entry = pendingRef.current;
		pendingRef.current = null;
		setPending(null);
		entry?.resolve(decision);
	}, []);

	const submit = () => {
		if (editor.value.trim().length === 0) return;
		if (!runner.submit(editor.value)) {
			setNotice(
				runner.processing
					? "A request is still running. Press Esc to interrupt it."
					: "The interrupted request is still stopping. Try again in a moment."
			);
			return;
		}
		setNotice(null);
		setEditor(commitLine(editor));
	};

	useInput(
		(input, key) => {
			if (debug) {
				setLastKey(
					describeKey(input, {
						ctrl: key.ctrl,
						meta: key.meta,
						shift: key.shift,
						escape: key.escape,
						return: key.return,
					})
				);
			}

			if (key.escape) {
				if (panel) {
					setPanel(null);
					setLastAction("panel: close");
				} else if (runner.interrupt()) {
					setNotice(null);
					setLastAction("interrupt");
				}
				return;
			}
			if (key.return && !key.shift) {
				submit();
				setLastAction("submit");
				return;
			}
			if (key.meta && input.toLowerCase() === "a") {
				if (gate.mode === "SAFE") setDialog("arm");
				else {
					gate.disarm();
					setNotice("Session disarmed. Side-effecting tools are blocked.");
				}
				return;
			}
			if (key.meta && input.toLowerCase() === "d") {
				setPanel((p) => (p === "diff" ? null : "diff"));
				return;
			}
			if (key.meta && input.toLowerCase() === "l") {
				setPanel((p) => (p === "logs" ? null : "logs"));
				return;
			}
			if (key.ctrl && input.toLowerCase() === "l") {
				if (renderLoop.timeline.cards.length === 0) return;
				if (runner.busy) setNotice("Wait for the current request to finish before clearing.");
				else setDialog("clear");
				return;
			}

			const edited = editLine(editor, input, key);
			if (edited) {
				setEditor(edited.state);
				setLastAction(edited.action);
			}
		},
		{ isActive: pending === null && dialog === null }
	);

	const state = renderLoop.snapshot;
	const cards = renderLoop.timeline.cards;

	return (
		<Box flexDirection="column">
			<Header
				mode={gate.mode}
				agentStatus={state.agentStatus}
				model={session.model}
				approved={gate.tracker.approved()}
				ctxPct={state.ctxPct}
				tokensPerSec={renderLoop.tokensPerSecond()}
				activeTask={runner.activeTask}
				activity={state.activity}
			/>
			<Box marginTop={1} flexDirection="column">
				<TimelineView
					cards={cards}
					labelFor={(name) => registry.profileOf(name)?.label ?? name}
				/>
			</Box>
			{panel === "diff" && <DiffPanel diff={state.diff} />}
			{panel === "logs" && <LogsPanel entries={logs.entries()} verify={state.verify} />}
			{pending && <ApprovalDialog request={pending.request} onDecision={decide} />}
			{dialog === "arm" && (
				<ConfirmDialog
					title="Arm the session?"
					color="red"
					message="Side-effecting tools may then run after you approve each call."
					onConfirm={() => {
						gate.arm();
						setDialog(null);
						setNotice(null);
					}}
					onCancel={() => setDialog(null)}
				/>
			)}
			{dialog === "clear" && (
				<ConfirmDialog
					title="Clear the transcript?"
					message={`${cards.length} card(s) will be removed and category approvals reset.`}
					onConfirm={() => {
						session.clear();
						setDialog(null);
					}}
					onCancel={() => setDialog(null)}
				/>
			)}
			{notice && <Text color="yellow">{notice}</Text>}
			<UserInput
				value={editor.value}
				cursor={editor.cursor}
				disabled={runner.processing}
				debug={debug}
				lastKey={lastKey}
				lastAction={lastAction}
			/>
			<Text color="gray">
				Enter send · Esc interrupt · Alt+A arm/disarm · Alt+D diff · Alt+L logs · Ctrl+L clear
			</Text>
		</Box>
	);
};

export default App;
