import * as ohm from 'ohm-js'

/**
 * Grammar for the SystemVerilog declaration subset.
 *
 * Keywords are matched through `kw<word>`, which refuses to stop in the middle
 * of a longer identifier (`int` never matches the front of `integer`).
 *
 * Expression rules are left-recursive, one rule per precedence level,
 * loosest first.
 */
const grammarSource = String.raw`
SystemVerilog {
  SourceFile = Member*

  Member = TypedefDeclaration
         | ForwardTypedef
         | NetTypeDeclaration
         | ParameterDeclaration
         | FunctionDeclaration
         | AlwaysBlock
         | NetDeclaration
         | DataDeclaration

  // Declarations
  TypedefDeclaration = kw<"typedef"> DataType identifier Dimension* ";"
  ForwardTypedef = kw<"typedef"> ForwardCategory? identifier ";"
  ForwardCategory = kw<"interface"> kw<"class">  -- interfaceClass
                  | forwardKeyword               -- simple
  NetTypeDeclaration = kw<"nettype"> DataType identifier WithFunction? ";"
  WithFunction = kw<"with"> identifier
  ParameterDeclaration = parameterKeyword DataTypeOrImplicit NonemptyListOf<Declarator, ","> ";"
  FunctionDeclaration = kw<"function"> DataTypeOrImplicit identifier ";" kw<"endfunction">
  AlwaysBlock = kw<"always"> TimingControl ";"
  NetDeclaration = netKindKeyword DataTypeOrImplicit NonemptyListOf<Declarator, ","> ";"
  DataDeclaration = DataType NonemptyListOf<Declarator, ","> ";"

  Declarator = identifier Dimension* Initializer?
  Initializer = "=" Expression

  // Data types
  DataType = IntegerVectorType
           | IntegerAtomType
           | NonIntegerType
           | SimpleType
           | EnumType
           | StructType
           | NamedType
  DataTypeOrImplicit = DataType &identifier  -- explicit
                     | ImplicitType          -- implicit
  IntegerVectorType = integerVectorKeyword Signing? Dimension*
  IntegerAtomType = integerAtomKeyword Signing? Dimension*
  NonIntegerType = nonIntegerKeyword
  SimpleType = simpleTypeKeyword
  EnumType = kw<"enum"> DataType? "{" NonemptyListOf<EnumMember, ","> "}" Dimension*
  EnumMember = identifier Initializer?
  StructType = kw<"struct"> StructPacking? "{" StructMember+ "}" Dimension*
  StructPacking = kw<"packed"> Signing?
  StructMember = DataType NonemptyListOf<Declarator, ","> ";"
  NamedType = identifier Dimension*
  ImplicitType = Signing? Dimension*
  Signing = kw<"signed"> | kw<"unsigned">
  Dimension = "[" Expression ":" Expression "]"  -- range
            | "[" Expression "]"                 -- size

  // Timing controls
  TimingControl = "##" Primary                    -- cycle
                | "#" Primary                     -- delay
                | "@" "*"                         -- implicitStar
                | "@" "(" "*" ")"                 -- implicitParen
                | "@" "(" EventExpression ")"     -- expression
                | "@" identifier                  -- name
  EventExpression = EventExpression kw<"or"> EventTerm  -- or
                  | EventExpression "," EventTerm       -- comma
                  | EventTerm
  EventTerm = edgeKeyword Expression       -- edge
            | Expression                   -- signal
            | "(" EventExpression ")"      -- paren

  // Expressions
  Expression = OrExpr
  OrExpr = OrExpr orOp XorExpr           -- binary
         | XorExpr
  XorExpr = XorExpr xorOp AndExpr        -- binary
          | AndExpr
  AndExpr = AndExpr andOp ShiftExpr      -- binary
          | ShiftExpr
  ShiftExpr = ShiftExpr shiftOp AddExpr  -- binary
            | AddExpr
  AddExpr = AddExpr addOp MulExpr        -- binary
          | MulExpr
  MulExpr = MulExpr mulOp UnaryExpr      -- binary
          | UnaryExpr
  UnaryExpr = unaryOp UnaryExpr          -- op
            | Primary
  Primary = "(" Expression ")"           -- paren
          | literal
          | identifier

  orOp = "|"
  xorOp = "^"
  andOp = "&"
  shiftOp = "<<" | ">>"
  addOp = "+" | "-"
  mulOp = "*" | "/" | "%"
  unaryOp = "+" | "-" | "~"

  // Literals
  literal = realLiteral | basedLiteral | decimalLiteral | stringLiteral
  realLiteral = decimalDigits "." decimalDigits exponent?  -- fraction
              | decimalDigits exponent                     -- exponent
  exponent = ("e" | "E") ("+" | "-")? decimalDigits
  basedLiteral = decimalDigits? "'" signedMarker? baseChar baseDigits
  signedMarker = "s" | "S"
  baseChar = "b" | "B" | "o" | "O" | "d" | "D" | "h" | "H"
  baseDigits = (hexDigit | "x" | "X" | "z" | "Z" | "?") (hexDigit | "x" | "X" | "z" | "Z" | "?" | "_")*
  decimalLiteral = decimalDigits
  decimalDigits = digit (digit | "_")*
  stringLiteral = "\"" stringChar* "\""
  stringChar = "\\" any             -- escape
             | ~("\"" | "\n") any   -- plain

  // Keyword groups
  integerVectorKeyword = kw<"bit"> | kw<"logic"> | kw<"reg">
  integerAtomKeyword = kw<"byte"> | kw<"shortint"> | kw<"int"> | kw<"longint"> | kw<"integer"> | kw<"time">
  nonIntegerKeyword = kw<"shortreal"> | kw<"realtime"> | kw<"real">
  simpleTypeKeyword = kw<"string"> | kw<"chandle"> | kw<"event"> | kw<"void">
  forwardKeyword = kw<"enum"> | kw<"struct"> | kw<"union"> | kw<"class">
  parameterKeyword = kw<"parameter"> | kw<"localparam">
  edgeKeyword = kw<"posedge"> | kw<"negedge"> | kw<"edge">
  netKindKeyword = kw<"wire"> | kw<"uwire"> | kw<"tri0"> | kw<"tri1"> | kw<"triand"> | kw<"trior">
                 | kw<"trireg"> | kw<"tri"> | kw<"wand"> | kw<"wor"> | kw<"supply0"> | kw<"supply1">

  reserved = integerVectorKeyword | integerAtomKeyword | nonIntegerKeyword | simpleTypeKeyword
           | forwardKeyword | parameterKeyword | edgeKeyword | netKindKeyword
           | kw<"typedef"> | kw<"interface"> | kw<"nettype"> | kw<"with"> | kw<"function">
           | kw<"endfunction"> | kw<"always"> | kw<"packed"> | kw<"signed"> | kw<"unsigned">
           | kw<"or">

  kw<word> = word ~identPart

  identifier = ~reserved identStart identPart*
  identStart = letter | "_"
  identPart = alnum | "_" | "$"

  space += comment
  comment = "//" (~"\n" any)*        -- line
          | "/*" (~"*/" any)* "*/"   -- block
}
`

/**
 * The compiled declaration grammar.
 */
export const SystemVerilogGrammar = ohm.grammar(grammarSource)
