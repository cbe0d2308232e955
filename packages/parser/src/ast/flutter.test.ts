import { describe, it, expect } from 'vitest';
import { analyzeFlutter, integrateFlutterAnalysis } from './flutter.js';
import type { ASTNode } from './types.js';

const COUNTER_APP = `import 'package:flutter/material.dart';

class CounterApp extends StatelessWidget {
  @override
  Widget build(BuildContext context) {
    return MaterialApp(home: Scaffold(appBar: AppBar(), body: _buildBody()));
  }

  Widget _buildBody() => const Text('hi');
}

class Counter extends StatefulWidget {
  @override
  State<Counter> createState() => _CounterState();
}

class _CounterState extends State<Counter> {
  @override
  void dispose() {
    super.dispose();
  }

  void _open(BuildContext context) {
    Navigator.of(context).push(MaterialPageRoute(builder: (_) => CounterApp()));
    setState(() {});
  }
}
`;

function emptyRoot(): ASTNode {
  return {
    id: 'root',
    type: 'compilation_unit',
    value: '',
    location: { filePath: 'lib/a.dart', line: 1, column: 1, endLine: 1, endColumn: 1 },
    children: [],
    metadata: { parser: 'regex' },
  };
}

describe('analyzeFlutter', () => {
  it('should describe a Material app', () => {
    const analysis = analyzeFlutter(COUNTER_APP);

    expect(analysis.isFlutter).toBe(true);
    expect(analysis.framework).toBe('flutter');
    expect(analysis.uiFramework).toBe('material');
    expect(analysis.widgets).toEqual([
      { name: 'CounterApp', kind: 'stateless', hasBuildMethod: true },
      { name: 'Counter', kind: 'stateful', hasBuildMethod: false },
      { name: '_CounterState', kind: 'state', hasBuildMethod: true },
    ]);
    expect(analysis.stateManagement).toBe('setState');
    expect(analysis.features).toEqual(['MaterialApp', 'Scaffold', 'AppBar']);
    expect(analysis.hasNavigation).toBe(true);
    expect(analysis.lifecycleMethods).toEqual(['dispose']);
    expect(analysis.compositionDepth).toBe(1);
    expect(analysis.buildHelpers).toEqual(['_buildBody']);
    expect(analysis.hasOverride).toBe(true);
  });

  it('should require a Flutter import', () => {
    const analysis = analyzeFlutter(`class Home extends StatelessWidget {
  Widget build(BuildContext context) => Text('home');
}

class _HomeState extends State<Home> {}
`);

    expect(analysis.widgets.map(widget => widget.name)).toEqual(['Home', '_HomeState']);
    expect(analysis.isFlutter).toBe(false);
    expect(analysis.framework).toBe('none');
  });

  it('should report plain Dart as non-Flutter', () => {
    const analysis = analyzeFlutter('int add(int a, int b) => a + b;\n');

    expect(analysis.isFlutter).toBe(false);
    expect(analysis.framework).toBe('none');
    expect(analysis.uiFramework).toBe('none');
    expect(analysis.stateManagement).toBe('none');
    expect(analysis.compositionDepth).toBe(0);
  });

  it('should prefer riverpod over setState', () => {
    const analysis = analyzeFlutter(
      "import 'package:flutter_riverpod/flutter_riverpod.dart';\nclass Home extends ConsumerWidget {}\nvoid f() { setState(() {}); }\n",
    );

    expect(analysis.stateManagement).toBe('riverpod');
    expect(analysis.widgets).toEqual([{ name: 'Home', kind: 'consumer', hasBuildMethod: true }]);
  });

  it('should detect cupertino apps', () => {
    const analysis = analyzeFlutter("import 'package:flutter/cupertino.dart';\nfinal app = CupertinoApp();\n");

    expect(analysis.uiFramework).toBe('cupertino');
    expect(analysis.features).toEqual(['CupertinoApp']);
  });

  it('should round composition depth up per three widgets', () => {
    const source = Array.from({ length: 4 }, (_, i) => `class W${i} extends StatelessWidget {}`).join('\n');

    expect(analyzeFlutter(source).compositionDepth).toBe(2);
  });
});

describe('integrateFlutterAnalysis', () => {
  it('should write the analysis and summary flags', () => {
    const root = emptyRoot();
    const analysis = analyzeFlutter(COUNTER_APP);

    integrateFlutterAnalysis(root, analysis);

    expect(root.metadata).toEqual({
      parser: 'regex',
      flutter_analysis: analysis,
      has_flutter: true,
      flutter_framework: 'material',
      state_management: 'setState',
      has_navigation: true,
    });
  });

  it('should only mark non-Flutter files', () => {
    const root = emptyRoot();

    integrateFlutterAnalysis(root, analyzeFlutter('void main() {}\n'));

    expect(root.metadata?.has_flutter).toBe(false);
    expect(root.metadata?.flutter_framework).toBeUndefined();
  });
});
