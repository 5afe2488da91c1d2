import {
  createLeadChatAgent,
  isLeadRelatedQuestion,
  countByPriority,
  buildChatPrompt,
  displayValue,
  needsConversion,
  normalizeAnswer,
  getSuggestedQuestions,
  ChatLeadRecord,
} from "../chat";
import { GenerationOptions } from "../llm";
import { RateLimitError } from "../../errors";

const leads: ChatLeadRecord[] = [
  {
    full_name: "Ann Lee",
    company_name: "Acme",
    role: "CTO",
    score: 92,
    email: "ann@example.com",
    justification: "C-suite authority",
  },
  { full_name: null, company_name: "nan", role: "Engineer", score: 25.7, email: null, justification: null },
];

function fakeGenerator() {
  const complete = jest.fn<Promise<string>, [string, GenerationOptions?]>();
  return { complete, agent: createLeadChatAgent({ complete }) };
}

describe("Lead Chat", () => {
  let errorSpy: jest.SpyInstance;
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
    logSpy.mockRestore();
  });

  describe("answerQuestion", () => {
    it("should answer casual questions without lead data", async () => {
      const { complete, agent } = fakeGenerator();
      complete.mockResolvedValue(" Doing great! ");

      const result = await agent.answerQuestion("hello there, how are you?", leads);

      expect(result).toEqual({ answer: "Doing great!", success: true, error: null, leads_analyzed: 0 });
      expect(complete).toHaveBeenCalledWith(expect.any(String), { temperature: 0.9, maxTokens: 150 });
    });

    it("should fall back to a canned casual reply", async () => {
      const { complete, agent } = fakeGenerator();
      complete.mockRejectedValue(new Error("offline"));

      const result = await agent.answerQuestion("hello!", []);

      expect(result.answer).toBe(
        "I'm doing well, thank you! Is there anything about your leads I can help you with?"
      );
      expect(result.success).toBe(true);
    });

    it("should report missing data without calling the generator", async () => {
      const { complete, agent } = fakeGenerator();

      const result = await agent.answerQuestion("Who should I call first?", []);

      expect(result).toEqual({
        answer: "No lead data available yet. Please process some leads first!",
        success: true,
        error: null,
        leads_analyzed: 0,
      });
      expect(complete).not.toHaveBeenCalled();
    });

    it("should answer lead questions with one generation call", async () => {
      const { complete, agent } = fakeGenerator();
      complete.mockResolvedValue("  Ann Lee at Acme is your best bet.  ");

      const result = await agent.answerQuestion("Who should I call first?", leads);

      expect(result).toEqual({
        answer: "Ann Lee at Acme is your best bet.",
        success: true,
        error: null,
        leads_analyzed: 2,
      });
      expect(complete).toHaveBeenCalledTimes(1);
      expect(complete.mock.calls[0][0]).toContain("QUESTION: Who should I call first?");
      expect(complete.mock.calls[0][1]).toEqual({ temperature: 0.7, maxTokens: 500 });
    });

    it("should rewrite structured answers and normalize the result", async () => {
      const { complete, agent } = fakeGenerator();
      complete
        .mockResolvedValueOnce('{"answer": "Ann Lee"}')
        .mockResolvedValueOnce('{"summary": "Call Ann Lee at Acme."}');

      const result = await agent.answerQuestion("Which lead is best?", leads);

      expect(complete).toHaveBeenCalledTimes(2);
      expect(complete.mock.calls[1][0]).toContain('{"answer": "Ann Lee"}');
      expect(result.answer).toBe("Call Ann Lee at Acme.");
    });

    it("should report rate limiting", async () => {
      const { complete, agent } = fakeGenerator();
      complete.mockRejectedValue(new RateLimitError());

      const result = await agent.answerQuestion("Show me the top leads", leads);

      expect(result.success).toBe(false);
      expect(result.error).toBe("Rate limit exceeded (429)");
      expect(result.leads_analyzed).toBe(2);
    });

    it("should report other generation failures", async () => {
      const { complete, agent } = fakeGenerator();
      complete.mockRejectedValue(new Error("boom"));

      const result = await agent.answerQuestion("Show me the top leads", leads);

      expect(result).toEqual({
        answer: "Sorry, I encountered an error: boom",
        success: false,
        error: "boom",
        leads_analyzed: 2,
      });
    });
  });

  describe("prompt building", () => {
    it("should detect lead-related questions", () => {
      expect(isLeadRelatedQuestion("Which leads have budget?")).toBe(true);
      expect(isLeadRelatedQuestion("hello!")).toBe(false);
    });

    it("should count leads per priority band", () => {
      expect(countByPriority([{ score: 92 }, { score: 57 }, { score: 25 }, { score: 0 }])).toEqual({
        high: 1,
        medium: 1,
        low: 1,
      });
    });

    it("should list top leads with their justification", () => {
      const lines = buildChatPrompt("Who should I call?", leads).split("\n");

      expect(lines).toEqual(expect.arrayContaining([
        "CONTEXT - 2 leads analyzed:",
        "- 1 High Priority leads (scores 80-100)",
        "- 0 Medium Priority leads (scores 40-79)",
        "- 1 Low Priority leads (scores 1-39)",
        "1. Ann Lee from Acme - CTO - Score: 92/100 - Email: ann@example.com",
        "   Why: C-suite authority",
        "2. Unknown from N/A - Engineer - Score: 25/100 - Email: N/A",
        "(none beyond the top list)",
        "QUESTION: Who should I call?",
      ]));
    });

    it("should add the bottom leads for larger sets", () => {
      const many = Array.from({ length: 12 }, (_, i) => ({ score: i + 1 }));
      const lines = buildChatPrompt("Show all leads", many).split("\n");

      expect(lines).toContain("1. Unknown from N/A - N/A - Score: 12/100 - Email: N/A");
      expect(lines).toContain("1. Unknown from N/A - N/A - Score: 5/100 - Email: N/A");
      expect(lines).not.toContain("(none beyond the top list)");
    });

    it("should hide missing-value markers", () => {
      expect(displayValue(null)).toBe("N/A");
      expect(displayValue(" nan ")).toBe("N/A");
      expect(displayValue("Acme ")).toBe("Acme");
      expect(displayValue(undefined, "Unknown")).toBe("Unknown");
    });
  });

  describe("answer post-processing", () => {
    it("should flag structured answers", () => {
      expect(needsConversion('{"a": 1}')).toBe(true);
      expect(needsConversion('Name: "A", "B", "C"')).toBe(true);
      expect(needsConversion('The "answer": yes')).toBe(true);
      expect(needsConversion("Plain prose.")).toBe(false);
    });

    it("should flatten quoted value lists", () => {
      expect(normalizeAnswer('"Ann Lee", "CTO", "Acme"')).toBe("Lead information: Ann Lee | CTO | Acme");
    });

    it("should unwrap JSON text fields and stray quotes", () => {
      expect(normalizeAnswer('{"response": "Focus on Acme."}')).toBe("Focus on Acme.");
      expect(normalizeAnswer('"Hello"')).toBe("Hello");
      expect(normalizeAnswer('{"foo": 1}')).toBe('{"foo": 1}');
    });
  });

  describe("getSuggestedQuestions", () => {
    it("should suggest getting started without leads", () => {
      expect(getSuggestedQuestions([])).toEqual(["How do I get started?", "What can you help me with?"]);
    });

    it("should lead with the high priority count", () => {
      const suggestions = getSuggestedQuestions([{ score: 90 }, { score: 85 }, { score: 10 }]);

      expect(suggestions).toHaveLength(8);
      expect(suggestions[0]).toBe("Tell me about the 2 high priority leads");
      expect(suggestions[7]).toBe("Compare high vs medium priority leads");
    });

    it("should keep the canned list when nothing is high priority", () => {
      const suggestions = getSuggestedQuestions([{ score: 30 }]);

      expect(suggestions).toHaveLength(8);
      expect(suggestions[0]).toBe("Who are the top 5 leads I should contact?");
    });
  });
});
