/**
 * Shared schema texts for the test suites.
 */

export const demoSchema = `
-- Control flow and boolean expressions
module demo {
  cflow = Break | Continue | Return(int status)

  bool_expr = BoolLit(bool value)
            | BoolUnary(string op, bool_expr child)
            | BoolBinary(string op, bool_expr left, bool_expr right)

  call = Call(string name, int* args, string? label)

  entry = (string key, int value)

  expr = Lit(int value)
       | Neg(expr operand)
       attributes (int line)
}
`;

export const arithSchema = `
module arith {
  arith_expr = Const(int i)
             | ArithVar(string name)
             | ArithUnary(string op, arith_expr child)
             | ArithBinary(string op, arith_expr left, arith_expr right)
             | FuncCall(string name, arith_expr* args)
}
`;
