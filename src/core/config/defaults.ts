// CHANGE: Default verifier configuration for the BACnet Arduino library layout
// PURITY: CORE
// INVARIANT: defaults are read-only; overrides produce new objects
// COMPLEXITY: O(1)

import type {
	Component,
	GuardConfig,
	LayoutConfig,
	VerifierConfig,
} from "../types/index.js";

function objectComponent(
	name: string,
	flag: string,
	withSources: boolean,
): Component {
	const identifier = `BACnet${name}`;
	return {
		name,
		kind: "object",
		identifier,
		flag,
		sources: withSources ? [`src/${identifier}.h`, `src/${identifier}.cpp`] : [],
		includes: [`${identifier}.h`],
	};
}

export const DEFAULT_GUARD_CONFIG: GuardConfig = {
	configSource: "src/BACnetConfig.h",
	aggregator: "src/BACnetArduino.h",
	tierMacro: "BOARD_TIER",
	requiredFlags: [
		"BACNET_OBJECT_DEVICE",
		"BACNET_OBJECT_BINARY_VALUE",
		"BACNET_OBJECT_ANALOG_VALUE",
		"BACNET_OBJECT_BINARY_OUTPUT",
		"BACNET_OBJECT_ANALOG_INPUT",
		"BACNET_FEATURE_COV",
		"BACNET_FEATURE_PRIORITY_ARRAY",
	],
	tierExpectations: [{ flag: "BACNET_OBJECT_BINARY_OUTPUT", minTier: 2 }],
	components: [
		objectComponent("BinaryValue", "BACNET_OBJECT_BINARY_VALUE", true),
		objectComponent("AnalogValue", "BACNET_OBJECT_ANALOG_VALUE", true),
		objectComponent("BinaryOutput", "BACNET_OBJECT_BINARY_OUTPUT", false),
		objectComponent("AnalogInput", "BACNET_OBJECT_ANALOG_INPUT", false),
		objectComponent("MultiStateValue", "BACNET_OBJECT_MULTI_STATE_VALUE", false),
	],
	features: [
		{
			name: "COV",
			flag: "BACNET_FEATURE_COV",
			operations: ["enableCOV", "disableCOV", "_cov_enabled"],
		},
	],
	sourceRoots: ["src"],
	sourceExtensions: [".h", ".hpp", ".c", ".cc", ".cpp", ".ino"],
	examplesDir: "examples",
	sketchExtension: ".ino",
	tierNoticePattern: String.raw`Tier \d|REQUIRE_TIER|Mega|Due|ESP32`,
	featureGuardMode: "nesting",
};

export const DEFAULT_LAYOUT_CONFIG: LayoutConfig = {
	requiredFiles: [
		{ path: "library.properties", description: "Arduino Library Manager metadata" },
		{ path: "keywords.txt", description: "Syntax highlighting definitions" },
		{ path: "LICENSE", description: "License information" },
		{ path: "README.md", description: "Library documentation" },
	],
	requiredDirectories: [
		{ path: "src", description: "Source code directory" },
		{ path: "examples", description: "Example sketches directory" },
		{ path: "extras", description: "Additional documentation" },
	],
	sourceDir: "src",
	rootSourceExtensions: [".h", ".cpp"],
	metadataFile: "library.properties",
	metadataFields: [
		"name",
		"version",
		"author",
		"maintainer",
		"sentence",
		"paragraph",
		"category",
		"url",
		"architectures",
	],
	keywordsFile: "keywords.txt",
	keywordTypes: ["KEYWORD1", "KEYWORD2", "KEYWORD3", "LITERAL1", "LITERAL2"],
	examplesDir: "examples",
	sketchExtension: ".ino",
	vendoredStack: { path: "src/bacnet", extensions: [".c", ".h"], minFiles: 100 },
};

export const DEFAULT_CONFIG: VerifierConfig = {
	guards: DEFAULT_GUARD_CONFIG,
	layout: DEFAULT_LAYOUT_CONFIG,
};
