import type { ASTNode } from './types.js';

export type WidgetKind = 'stateless' | 'stateful' | 'state' | 'consumer' | 'hook';

export type StateManagement = 'riverpod' | 'bloc' | 'provider' | 'getx' | 'setState' | 'none';

export type UIFramework = 'material' | 'cupertino' | 'widgets' | 'none';

export interface FlutterWidget {
  name: string;
  kind: WidgetKind;
  hasBuildMethod: boolean;
}

export interface FlutterAnalysis {
  isFlutter: boolean;
  framework: 'flutter' | 'none';
  uiFramework: UIFramework;
  widgets: FlutterWidget[];
  stateManagement: StateManagement;
  /** Well-known scaffold widgets used in the file */
  features: string[];
  hasNavigation: boolean;
  lifecycleMethods: string[];
  compositionDepth: number;
  /** Private methods returning a Widget */
  buildHelpers: string[];
  hasOverride: boolean;
}

const WIDGET_PATTERNS: ReadonlyArray<[WidgetKind, RegExp, boolean]> = [
  ['stateless', /class\s+(\w+)\s+extends\s+StatelessWidget\b/g, true],
  ['consumer', /class\s+(\w+)\s+extends\s+ConsumerWidget\b/g, true],
  ['hook', /class\s+(\w+)\s+extends\s+HookWidget\b/g, true],
  ['stateful', /class\s+(\w+)\s+extends\s+StatefulWidget\b/g, false],
  ['state', /class\s+(\w+)\s+extends\s+State<\w+>/g, true],
];

/** Checked in order; the first match wins */
const STATE_MANAGEMENT_PATTERNS: ReadonlyArray<[StateManagement, RegExp]> = [
  ['riverpod', /package:(?:flutter_|hooks_)?riverpod\/|\bConsumerWidget\b|\bref\.watch\(/],
  ['bloc', /package:(?:flutter_)?bloc\/|\bBlocBuilder\b|\bBlocProvider\b/],
  ['provider', /package:provider\/|\bChangeNotifierProvider\b|\bcontext\.watch<|\bProvider\.of\b/],
  ['getx', /package:get\/|\bGetMaterialApp\b|\bObx\(/],
  ['setState', /\bsetState\s*\(/],
];

const WIDGET_FEATURES = ['MaterialApp', 'CupertinoApp', 'Scaffold', 'AppBar', 'FloatingActionButton'];

const LIFECYCLE_METHODS = ['initState', 'didChangeDependencies', 'didUpdateWidget', 'dispose'];

const NAVIGATION_PATTERN = /\bNavigator\.|\bMaterialPageRoute\b|\bGoRouter\b|\bcontext\.go\(|\bcontext\.push\(/;

const BUILD_HELPER_PATTERN = /\bWidget\s+(_\w+)\s*\(/g;

const FLUTTER_IMPORT = /import\s+['"]package:flutter\//;

function uiFrameworkOf(content: string): UIFramework {
  if (/package:flutter\/material\.dart/.test(content)) return 'material';
  if (/package:flutter\/cupertino\.dart/.test(content)) return 'cupertino';
  if (/package:flutter\/widgets\.dart/.test(content)) return 'widgets';
  return 'none';
}

function findWidgets(content: string): FlutterWidget[] {
  const widgets: FlutterWidget[] = [];
  for (const [kind, pattern, hasBuildMethod] of WIDGET_PATTERNS) {
    for (const match of content.matchAll(pattern)) {
      widgets.push({ name: match[1] ?? '', kind, hasBuildMethod });
    }
  }
  return widgets;
}

/**
 * Inspect Dart source for Flutter usage.
 *
 * Pure: it reads only the text and never produces symbols.
 */
export function analyzeFlutter(content: string): FlutterAnalysis {
  const uiFramework = uiFrameworkOf(content);
  const widgets = findWidgets(content);
  const isFlutter = FLUTTER_IMPORT.test(content);
  const stateManagement = STATE_MANAGEMENT_PATTERNS.find(([, pattern]) => pattern.test(content))?.[0] ?? 'none';

  return {
    isFlutter,
    framework: isFlutter ? 'flutter' : 'none',
    uiFramework,
    widgets,
    stateManagement,
    features: WIDGET_FEATURES.filter(name => new RegExp(`\\b${name}\\s*\\(`).test(content)),
    hasNavigation: NAVIGATION_PATTERN.test(content),
    lifecycleMethods: LIFECYCLE_METHODS.filter(name => new RegExp(`\\bvoid\\s+${name}\\s*\\(`).test(content)),
    compositionDepth: widgets.length > 0 ? Math.max(1, Math.ceil(widgets.length / 3)) : 0,
    buildHelpers: Array.from(content.matchAll(BUILD_HELPER_PATTERN), match => match[1] ?? ''),
    hasOverride: content.includes('@override'),
  };
}

/**
 * Attach an analysis to a root node. Only the `flutter_analysis` key and the summary flags are written.
 */
export function integrateFlutterAnalysis(root: ASTNode, analysis: FlutterAnalysis): void {
  const metadata = root.metadata ?? {};
  metadata.flutter_analysis = analysis;
  metadata.has_flutter = analysis.isFlutter;
  if (analysis.isFlutter) {
    metadata.flutter_framework = analysis.uiFramework;
    metadata.state_management = analysis.stateManagement;
    metadata.has_navigation = analysis.hasNavigation;
  }
  root.metadata = metadata;
}
