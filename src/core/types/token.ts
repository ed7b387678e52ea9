// CHANGE: Lexical token classes produced by the scanner
// PURITY: CORE
// INVARIANT: Every token keeps its raw argv text

export type Token =
	| {
			readonly kind: "LongOption";
			readonly raw: string;
			readonly name: string;
			readonly inlineValue: string | undefined;
	  }
	| { readonly kind: "ShortOption"; readonly raw: string; readonly name: string }
	| { readonly kind: "Terminator"; readonly raw: string }
	| { readonly kind: "Positional"; readonly raw: string };

export type TokenKind = Token["kind"];
