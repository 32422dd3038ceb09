import { describe, it, expect } from "vitest";
import React from "react";
import { render } from "ink-testing-library";
import { Markdown } from "../src/components/markdown";
import { stripAnsi } from "./helpers/ansi";

describe("Markdown component", () => {
	it("renders headings, emphasis, and links", () => {
		const { lastFrame } = render(
			<Markdown
				content={`# Title\n\nThis is **bold** and _italic_.\nVisit [docs](https://example.test).`}
			/>
		);
		const output = stripAnsi(lastFrame());
		expect(output).toContain("Title");
		expect(output).toContain("bold");
		expect(output).toContain("italic");
		expect(output).toContain("docs (https://example.test)");
	});

	it("renders lists and fenced code blocks", () => {
		const { lastFrame } = render(
			<Markdown
				content={`- item one\n- item two\n\n\`\`\`ts\nconst answer = 42;\n\`\`\``}
			/>
		);
		const output = stripAnsi(lastFrame());
		expect(output).toContain("• item one");
		expect(output).toContain("• item two");
		expect(output).toContain("const answer = 42;");
	});

	it("renders diff fences line by line", () => {
		const { lastFrame } = render(
			<Markdown content={"```diff\n-old line\n+new line\n```"} />
		);
		const output = stripAnsi(lastFrame());
		expect(output).toContain("-old line");
		expect(output).toContain("+new line");
	});

	it("renders nothing for empty content", () => {
		const { lastFrame } = render(<Markdown content={""} />);
		expect(stripAnsi(lastFrame())).toBe("");
	});
});
